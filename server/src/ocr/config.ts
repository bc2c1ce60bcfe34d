import path from 'path';

import type { RecognitionLevel } from './types';

export const SERVER_NAME = 'vision-framework-ocr';
export const SERVER_VERSION = '0.1.0';

export const DEFAULT_LANGUAGES: readonly string[] = Object.freeze(['ja-JP', 'en-US']);
export const RECOGNITION_LEVELS: readonly RecognitionLevel[] = Object.freeze(['accurate', 'fast'] as const);
export const DEFAULT_RECOGNITION_LEVEL: RecognitionLevel = 'accurate';

export const ALLOWED_EXTENSIONS: ReadonlySet<string> = new Set([
  '.png',
  '.jpg',
  '.jpeg',
  '.tif',
  '.tiff',
  '.heic',
  '.heif',
  '.bmp',
  '.gif',
  '.webp',
]);

export type HelperPaths = {
  script: string;
  binary: string;
};

export type OcrConfig = Readonly<{
  helper: Readonly<HelperPaths>;
  timeoutMs: number; // 0 = wait for the helper however long it takes
}>;

type Env = Record<string, string | undefined>;

function envPath(env: Env, key: string, fallback: string): string {
  const raw = String(env[key] || '').trim();
  if (raw) return path.resolve(raw);
  return fallback;
}

function envTimeout(env: Env): number {
  const raw = env.VISION_OCR_TIMEOUT_MS;
  const n = raw ? Number(raw) : 0;
  return Number.isFinite(n) && n > 0 ? Math.floor(n) : 0;
}

export function loadOcrConfig(env: Env = process.env): OcrConfig {
  const home = envPath(env, 'VISION_OCR_HOME', process.cwd());
  return Object.freeze({
    helper: Object.freeze({
      script: envPath(env, 'VISION_OCR_HELPER_SCRIPT', path.join(home, 'vision_ocr.swift')),
      binary: envPath(env, 'VISION_OCR_HELPER_BIN', path.join(home, '.build', 'vision_ocr')),
    }),
    timeoutMs: envTimeout(env),
  });
}
