import type { HelperPaths } from './config';
import type { OcrFailure, OcrOutcome, RecognitionLevel, RecognitionRequest, RecognitionResult } from './types';
import { RECOGNITION_LEVELS } from './config';
import { err, errorMessage, ok } from './errors';
import { locateHelper } from './helperLocator';
import { ocrLog, ocrLogEnabled, tailString } from './ocrLog';
import { runProcess, type ProcessRunner } from './processRunner';
import { isJsonObject, normalizeHelperPayload } from './resultNormalize';

export type VisionRunnerDeps = {
  helper: HelperPaths;
  runProcess?: ProcessRunner;
  timeoutMs?: number;
};

const EMPTY_STDERR_MESSAGE = 'Swift OCR helper failed without stderr output.';

function isRecognitionLevel(level: string): level is RecognitionLevel {
  return RECOGNITION_LEVELS.some((l) => l === level);
}

export function validateRecognitionRequest(req: RecognitionRequest): OcrFailure | null {
  if (!isRecognitionLevel(req.recognitionLevel)) {
    return err('INVALID_PARAMETER', `recognition_level must be one of [${[...RECOGNITION_LEVELS].sort().join(', ')}]`);
  }
  const c = req.minConfidence;
  if (typeof c !== 'number' || !Number.isFinite(c) || c < 0 || c > 1) {
    return err('INVALID_PARAMETER', 'min_confidence must be between 0.0 and 1.0');
  }
  return null;
}

/**
 * Three-decimal encoding of the confidence threshold, rounding exact ties to
 * the even digit. `toFixed` rounds ties up; only odd multiples of 1/16 land
 * exactly halfway between two thousandths.
 */
export function formatConfidence(value: number): string {
  const sixteenths = value * 16;
  if (Number.isInteger(sixteenths) && sixteenths % 2 !== 0) {
    const lower = Math.floor(value * 1000);
    return ((lower % 2 === 0 ? lower : lower + 1) / 1000).toFixed(3);
  }
  return value.toFixed(3);
}

// Flag names and value encodings are fixed by the helper's CLI.
export function buildHelperArgs(req: RecognitionRequest): string[] {
  return [
    '--input',
    req.imagePath,
    '--languages',
    req.languages.join(','),
    '--recognition-level',
    req.recognitionLevel,
    '--language-correction',
    String(req.languageCorrection).toLowerCase(),
    '--sort-reading-order',
    String(req.sortReadingOrder).toLowerCase(),
    '--min-confidence',
    formatConfidence(req.minConfidence),
  ];
}

export function parseHelperOutput(stdout: string): OcrOutcome<RecognitionResult> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch (e) {
    return err('INVALID_HELPER_OUTPUT', `Helper returned invalid JSON: ${errorMessage(e)}`, e);
  }
  if (!isJsonObject(parsed)) {
    return err('INVALID_HELPER_OUTPUT', 'Helper returned invalid JSON: expected an object at the top level');
  }
  return ok(normalizeHelperPayload(parsed));
}

export async function runVisionHelper(req: RecognitionRequest, deps: VisionRunnerDeps): Promise<OcrOutcome<RecognitionResult>> {
  const invalid = validateRecognitionRequest(req);
  if (invalid) return invalid;

  const helper = await locateHelper(deps.helper);
  if (helper.ok !== true) return helper;

  const [bin, ...lead] = helper.value.command;
  const args = [...lead, ...buildHelperArgs(req)];
  const run = deps.runProcess ?? runProcess;

  if (ocrLogEnabled('debug')) {
    ocrLog('debug', 'helper start', { kind: helper.value.kind, command: bin, args });
  }

  const start = Date.now();
  const result = await run(bin, args, { timeoutMs: deps.timeoutMs });
  const durationMs = Date.now() - start;

  if (result.ok !== true) {
    ocrLog('warn', 'helper spawn failed', { command: bin, err: tailString(result.spawnErr, 800) });
    return err('HELPER_EXECUTION_FAILED', `Failed to start OCR helper: ${errorMessage(result.spawnErr)}`, result.spawnErr);
  }

  if (result.timedOut) {
    ocrLog('warn', 'helper timed out', { command: bin, durationMs, timeoutMs: deps.timeoutMs });
    return err('HELPER_EXECUTION_FAILED', `OCR helper timed out after ${deps.timeoutMs}ms.`, result.err);
  }

  if (result.code !== 0) {
    const stderr = result.err.trim();
    ocrLog('warn', 'helper nonzero exit', { exit: result.code, durationMs, stderr: tailString(stderr, 1200) });
    return err('HELPER_EXECUTION_FAILED', stderr || EMPTY_STDERR_MESSAGE);
  }

  const parsed = parseHelperOutput(result.out);
  if (parsed.ok !== true) {
    ocrLog('warn', 'helper invalid JSON', { durationMs, stdout: tailString(result.out, 800), stderr: tailString(result.err, 800) });
    return parsed;
  }

  ocrLog('debug', 'helper ok', {
    durationMs,
    lineCount: parsed.value.line_count,
    stderrLen: result.err.length,
  });
  return parsed;
}
