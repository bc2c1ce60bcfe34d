import { spawn } from 'child_process';

export type ProcessResult =
  | { ok: true; out: string; err: string; code: number; timedOut: boolean }
  | { ok: false; spawnErr: unknown };

export type ProcessRunOptions = {
  timeoutMs?: number;
};

export type ProcessRunner = (command: string, args: string[], opts?: ProcessRunOptions) => Promise<ProcessResult>;

// Never rejects: spawn failures come back as { ok: false }.
export const runProcess: ProcessRunner = async (command, args, opts) => {
  return await new Promise<ProcessResult>((resolve) => {
    let stdout = '';
    let stderr = '';
    let resolved = false;
    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;

    const proc = spawn(command, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
      env: process.env,
    });

    if (opts?.timeoutMs && opts.timeoutMs > 0) {
      timer = setTimeout(() => {
        timedOut = true;
        proc.kill('SIGKILL');
      }, opts.timeoutMs);
    }

    proc.stdout.setEncoding('utf8');
    proc.stderr.setEncoding('utf8');
    proc.stdout.on('data', (d: string) => { stdout += d; });
    proc.stderr.on('data', (d: string) => { stderr += d; });

    proc.on('error', (e) => {
      if (resolved) return;
      resolved = true;
      if (timer) clearTimeout(timer);
      resolve({ ok: false, spawnErr: e });
    });

    proc.on('close', (code) => {
      if (resolved) return;
      resolved = true;
      if (timer) clearTimeout(timer);
      resolve({ ok: true, out: stdout, err: stderr, code: typeof code === 'number' ? code : -1, timedOut });
    });
  });
};
