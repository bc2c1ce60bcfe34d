import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

import type { ImageReference, OcrOutcome } from './types';
import { ALLOWED_EXTENSIONS } from './config';
import { err, ok } from './errors';

const TILDE_PREFIX = /^~([^/\\]*)(?=$|[/\\])/;

function homeOf(user: string): string | null {
  if (!user) return os.homedir();
  try {
    const me = os.userInfo();
    return me.username === user ? me.homedir : null;
  } catch {
    return null; // no passwd entry for the running uid
  }
}

// `~` and `~<current user>` expand; Node has no lookup for other users' homes.
export function expandHome(p: string): string {
  const m = TILDE_PREFIX.exec(p);
  if (!m) return p;
  const home = homeOf(m[1] ?? '');
  return home === null ? p : home + p.slice(m[0].length);
}

function isMissing(e: unknown): boolean {
  if (typeof e !== 'object' || e === null || !('code' in e)) return false;
  return e.code === 'ENOENT' || e.code === 'ENOTDIR';
}

/**
 * Turns a caller-supplied image path into an absolute, symlink-free path to an
 * existing regular file with a supported extension.
 */
export async function resolveImagePath(raw: string): Promise<OcrOutcome<ImageReference>> {
  const expanded = expandHome(String(raw ?? ''));
  let candidate = path.resolve(process.cwd(), expanded);

  try {
    candidate = await fs.realpath(candidate);
  } catch (e) {
    if (isMissing(e)) return err('NOT_FOUND', `File not found: ${candidate}`);
    throw e;
  }

  const stat = await fs.stat(candidate);
  if (!stat.isFile()) return err('NOT_A_FILE', `Path is not a file: ${candidate}`);

  const extension = path.extname(candidate).toLowerCase();
  if (!ALLOWED_EXTENSIONS.has(extension)) {
    const supported = Array.from(ALLOWED_EXTENSIONS).sort().join(', ');
    return err('UNSUPPORTED_EXTENSION', `Unsupported extension: ${path.extname(candidate)}. Supported: ${supported}`);
  }

  return ok({ raw, resolvedPath: candidate, extension });
}
