export type OcrLogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

const SEVERITY: readonly OcrLogLevel[] = ['silent', 'error', 'warn', 'info', 'debug', 'trace'];

const ALIASES: Readonly<Record<string, OcrLogLevel>> = {
  none: 'silent',
  off: 'silent',
  warning: 'warn',
  verbose: 'debug',
};

export function parseLevel(raw: unknown): OcrLogLevel {
  const s = String(raw ?? '').trim().toLowerCase();
  const known = SEVERITY.find((l) => l === s);
  return known ?? ALIASES[s] ?? 'warn';
}

// Re-read on every call so OCR_LOG_LEVEL can be flipped while the server runs.
export function ocrLogEnabled(level: OcrLogLevel): boolean {
  const threshold = SEVERITY.indexOf(parseLevel(process.env.OCR_LOG_LEVEL));
  return level !== 'silent' && SEVERITY.indexOf(level) <= threshold;
}

function toPayload(extra: unknown): unknown {
  if (extra == null) return undefined;
  if (extra instanceof Error) return { name: extra.name, message: extra.message };
  if (typeof extra !== 'object') return extra;
  try {
    return JSON.parse(JSON.stringify(extra));
  } catch {
    return String(extra); // cyclic or otherwise unserialisable
  }
}

// stdout belongs to the MCP transport, so every level is written to stderr.
export function ocrLog(level: Exclude<OcrLogLevel, 'silent'>, msg: string, extra?: unknown): void {
  if (!ocrLogEnabled(level)) return;
  const line = `[OCR] ${level.toUpperCase()} ${msg}`;
  const payload = toPayload(extra);
  if (payload === undefined) console.error(line);
  else console.error(line, payload);
}

export function tailString(s: unknown, max = 1200): string {
  const str = String(s ?? '');
  if (str.length <= max) return str;
  return `${str.slice(0, max)}…(+${str.length - max} chars)`;
}
