import type { OcrErrorCode, OcrFailure, OcrOutcome } from './types';

export function err(code: OcrErrorCode, message: string, cause?: unknown): OcrFailure {
  return { ok: false, code, message, cause: cause ? String(cause) : undefined };
}

export function ok<T>(value: T): OcrOutcome<T> {
  return { ok: true, value };
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
