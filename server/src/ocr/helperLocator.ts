import * as fs from 'fs/promises';
import { constants as fsConstants } from 'fs';

import type { HelperPaths } from './config';
import type { OcrOutcome } from './types';
import { err, ok } from './errors';

export type HelperCommand = {
  kind: 'binary' | 'script';
  command: string[]; // executable first, then any fixed leading args
};

// Launcher used both to interpret the helper script and to compile it.
export const TOOLCHAIN_LAUNCHER = 'xcrun';

async function isFile(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isFile();
  } catch {
    return false;
  }
}

async function isExecutable(p: string): Promise<boolean> {
  if (!(await isFile(p))) return false;
  try {
    await fs.access(p, fsConstants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export async function locateHelper(paths: HelperPaths): Promise<OcrOutcome<HelperCommand>> {
  if (await isExecutable(paths.binary)) {
    return ok<HelperCommand>({ kind: 'binary', command: [paths.binary] });
  }

  if (!(await isFile(paths.script))) {
    return err('HELPER_MISSING', `Swift helper script not found: ${paths.script}`);
  }

  return ok<HelperCommand>({ kind: 'script', command: [TOOLCHAIN_LAUNCHER, 'swift', paths.script] });
}
