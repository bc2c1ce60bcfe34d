import * as fs from 'fs/promises';
import * as path from 'path';

import type { CompileOutcome, OcrOutcome } from './types';
import { err, errorMessage, ok } from './errors';
import { TOOLCHAIN_LAUNCHER } from './helperLocator';
import { ocrLog, tailString } from './ocrLog';
import { runProcess } from './processRunner';
import type { OcrDeps } from './ocrService';

async function exists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

// Build step only: produces the binary that locateHelper prefers over the script.
export async function compileHelper(deps: OcrDeps): Promise<OcrOutcome<CompileOutcome>> {
  const { script, binary } = deps.config.helper;
  if (!(await exists(script))) {
    return err('HELPER_MISSING', `Swift helper script not found: ${script}`);
  }

  await fs.mkdir(path.dirname(binary), { recursive: true });

  const run = deps.runProcess ?? runProcess;
  const args = ['swiftc', '-O', script, '-o', binary];
  ocrLog('info', 'compiling helper', { script, binary });

  const result = await run(TOOLCHAIN_LAUNCHER, args);
  if (result.ok !== true) {
    return err('COMPILATION_FAILED', `Failed to start ${TOOLCHAIN_LAUNCHER}: ${errorMessage(result.spawnErr)}`, result.spawnErr);
  }
  if (result.code !== 0) {
    const stderr = result.err.trim();
    ocrLog('warn', 'helper compilation failed', { exit: result.code, stderr: tailString(stderr, 1200) });
    return err('COMPILATION_FAILED', stderr || 'swiftc failed');
  }

  return ok<CompileOutcome>({ binary, status: 'compiled' });
}
