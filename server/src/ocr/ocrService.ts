import type { OcrConfig } from './config';
import type { OcrOutcome, RecognitionOptions, RecognitionRequest, RecognitionResult } from './types';
import { DEFAULT_LANGUAGES, DEFAULT_RECOGNITION_LEVEL } from './config';
import { ok } from './errors';
import { resolveImagePath } from './imageInput';
import type { ProcessRunner } from './processRunner';
import { runVisionHelper } from './visionRunner';

export type OcrDeps = {
  config: OcrConfig;
  runProcess?: ProcessRunner;
};

export function defaultLanguages(languages: RecognitionOptions['languages']): string[] {
  if (!languages || languages.length === 0) return [...DEFAULT_LANGUAGES];
  return languages;
}

export function toRecognitionRequest(imagePath: string, opts: RecognitionOptions = {}): RecognitionRequest {
  return {
    imagePath,
    languages: defaultLanguages(opts.languages),
    recognitionLevel: opts.recognitionLevel ?? DEFAULT_RECOGNITION_LEVEL,
    languageCorrection: opts.languageCorrection ?? true,
    sortReadingOrder: opts.sortReadingOrder ?? true,
    minConfidence: opts.minConfidence ?? 0,
  };
}

export async function ocrImage(path: string, opts: RecognitionOptions, deps: OcrDeps): Promise<OcrOutcome<RecognitionResult>> {
  const image = await resolveImagePath(path);
  if (image.ok !== true) return image;

  return await runVisionHelper(toRecognitionRequest(image.value.resolvedPath, opts), {
    helper: deps.config.helper,
    timeoutMs: deps.config.timeoutMs,
    runProcess: deps.runProcess,
  });
}

export async function ocrText(path: string, opts: RecognitionOptions, deps: OcrDeps): Promise<OcrOutcome<string>> {
  const result = await ocrImage(path, opts, deps);
  if (result.ok !== true) return result;

  const doc = result.value;
  const fullText = doc.full_text ?? doc.fullText ?? '';
  return ok(String(fullText));
}
