export type RecognitionLevel = 'accurate' | 'fast';

export type JsonObject = { [key: string]: unknown };

export type ImageReference = {
  raw: string; // exactly what the caller passed
  resolvedPath: string;
  extension: string; // lower-cased, with leading dot
};

export type RecognitionOptions = {
  languages?: string[] | null;
  recognitionLevel?: string;
  languageCorrection?: boolean;
  sortReadingOrder?: boolean;
  minConfidence?: number;
};

export type RecognitionRequest = {
  imagePath: string;
  languages: string[];
  recognitionLevel: string; // validated against RECOGNITION_LEVELS before spawn
  languageCorrection: boolean;
  sortReadingOrder: boolean;
  minConfidence: number;
};

// Canonical snake_case document: resolved_path, line_count, full_text and
// lines[].bbox.min_x / min_y, plus whatever else the helper emitted.
export type RecognitionResult = JsonObject;

export type BatchError = {
  path: string;
  error: string;
};

export type BatchOutcome = {
  total: number;
  succeeded: number;
  failed: number;
  results: RecognitionResult[];
  errors: BatchError[];
};

export type CompileOutcome = {
  binary: string;
  status: 'compiled';
};

export type OcrErrorCode =
  | 'NOT_FOUND'
  | 'NOT_A_FILE'
  | 'UNSUPPORTED_EXTENSION'
  | 'HELPER_MISSING'
  | 'INVALID_PARAMETER'
  | 'HELPER_EXECUTION_FAILED'
  | 'INVALID_HELPER_OUTPUT'
  | 'COMPILATION_FAILED';

export type OcrFailure = {
  ok: false;
  code: OcrErrorCode;
  message: string;
  cause?: string;
};

export type OcrSuccess<T> = { ok: true; value: T };

export type OcrOutcome<T> = OcrSuccess<T> | OcrFailure;
