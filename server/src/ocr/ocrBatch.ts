import type { BatchError, BatchOutcome, RecognitionOptions, RecognitionResult } from './types';
import { errorMessage } from './errors';
import { ocrLog } from './ocrLog';
import { defaultLanguages, ocrImage, type OcrDeps } from './ocrService';

/**
 * OCRs each path in order, one helper process at a time. A failing item lands
 * in `errors` under the string the caller passed and never stops the rest.
 */
export async function ocrBatch(paths: string[], opts: RecognitionOptions, deps: OcrDeps): Promise<BatchOutcome> {
  const shared: RecognitionOptions = { ...opts, languages: defaultLanguages(opts.languages) };
  const results: RecognitionResult[] = [];
  const errors: BatchError[] = [];

  for (const path of paths) {
    try {
      const outcome = await ocrImage(path, shared, deps);
      if (outcome.ok === true) results.push(outcome.value);
      else errors.push({ path, error: outcome.message });
    } catch (e) {
      errors.push({ path, error: errorMessage(e) });
    }
  }

  if (errors.length) {
    ocrLog('info', 'batch finished with failures', { total: paths.length, failed: errors.length });
  }

  return {
    total: paths.length,
    succeeded: results.length,
    failed: errors.length,
    results,
    errors,
  };
}
