import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { OcrConfig } from './config';
import { ocrBatch } from './ocrBatch';
import type { ProcessResult, ProcessRunner } from './processRunner';

function helperOutput(text: string): ProcessResult {
  return { ok: true, out: JSON.stringify({ fullText: text, lineCount: 1 }), err: '', code: 0, timedOut: false };
}

describe('ocrBatch', () => {
  let dir: string;
  let config: OcrConfig;

  beforeEach(async () => {
    dir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'vision-ocr-batch-')));
    config = {
      helper: { script: path.join(dir, 'vision_ocr.swift'), binary: path.join(dir, '.build', 'vision_ocr') },
      timeoutMs: 0,
    };
    await fs.writeFile(config.helper.script, '// helper');
    for (const name of ['a.png', 'b.jpg', 'c.gif']) {
      await fs.writeFile(path.join(dir, name), name);
    }
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('returns results in input order when every item succeeds', async () => {
    const run = vi.fn<ProcessRunner>(async (_cmd, args) => helperOutput(path.basename(args[args.indexOf('--input') + 1] ?? '')));
    const paths = ['a.png', 'b.jpg', 'c.gif'].map((n) => path.join(dir, n));

    const out = await ocrBatch(paths, {}, { config, runProcess: run });

    expect(out.total).toBe(3);
    expect(out.succeeded).toBe(3);
    expect(out.failed).toBe(0);
    expect(out.errors).toEqual([]);
    expect(out.results.map((r) => r.full_text)).toEqual(['a.png', 'b.jpg', 'c.gif']);
    expect(out.results[0]).toEqual({ full_text: 'a.png', line_count: 1 });
  });

  it('isolates failures and keys them by the original path string', async () => {
    const run = vi.fn<ProcessRunner>(async (_cmd, args) =>
      args.includes(path.join(dir, 'b.jpg'))
        ? { ok: true, out: '', err: 'model unavailable', code: 1, timedOut: false }
        : helperOutput('ok'),
    );
    vi.spyOn(process, 'cwd').mockReturnValue(dir);

    const out = await ocrBatch(['a.png', 'missing.png', 'b.jpg', 'c.gif'], {}, { config, runProcess: run });

    expect(out.total).toBe(4);
    expect(out.succeeded).toBe(2);
    expect(out.failed).toBe(2);
    expect(out.succeeded + out.failed).toBe(out.total);
    expect(out.errors).toEqual([
      { path: 'missing.png', error: `File not found: ${path.join(dir, 'missing.png')}` },
      { path: 'b.jpg', error: 'model unavailable' },
    ]);
    expect(run).toHaveBeenCalledTimes(3);
  });

  it('records a missing file with failed == 1 and succeeded == 0', async () => {
    const run = vi.fn<ProcessRunner>();
    const missing = path.join(dir, 'gone.png');

    expect(await ocrBatch([missing], {}, { config, runProcess: run })).toEqual({
      total: 1,
      succeeded: 0,
      failed: 1,
      results: [],
      errors: [{ path: missing, error: `File not found: ${missing}` }],
    });
  });

  it('records invalid parameters against every item', async () => {
    const run = vi.fn<ProcessRunner>();
    const paths = [path.join(dir, 'a.png'), path.join(dir, 'b.jpg')];

    const out = await ocrBatch(paths, { recognitionLevel: 'medium' }, { config, runProcess: run });

    expect(out.failed).toBe(2);
    expect(out.errors.map((e) => e.error)).toEqual([
      'recognition_level must be one of [accurate, fast]',
      'recognition_level must be one of [accurate, fast]',
    ]);
    expect(run).not.toHaveBeenCalled();
  });

  it('keeps going when an item throws', async () => {
    const run = vi
      .fn<ProcessRunner>()
      .mockRejectedValueOnce(new Error('boom'))
      .mockResolvedValueOnce(helperOutput('second'));
    const paths = [path.join(dir, 'a.png'), path.join(dir, 'b.jpg')];

    const out = await ocrBatch(paths, {}, { config, runProcess: run });

    expect(out.errors).toEqual([{ path: paths[0], error: 'boom' }]);
    expect(out.results).toEqual([{ full_text: 'second', line_count: 1 }]);
  });

  it('spawns one helper at a time', async () => {
    let running = 0;
    let peak = 0;
    const run = vi.fn<ProcessRunner>(async () => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((r) => setTimeout(r, 5));
      running--;
      return helperOutput('x');
    });
    const paths = ['a.png', 'b.jpg', 'c.gif'].map((n) => path.join(dir, n));

    await ocrBatch(paths, {}, { config, runProcess: run });

    expect(peak).toBe(1);
  });

  it('sends the default languages when none are given', async () => {
    const run = vi.fn<ProcessRunner>(async () => helperOutput('x'));

    await ocrBatch([path.join(dir, 'a.png')], { languages: [] }, { config, runProcess: run });

    const args = run.mock.calls[0]?.[1] ?? [];
    expect(args[args.indexOf('--languages') + 1]).toBe('ja-JP,en-US');
  });

  it('handles an empty batch', async () => {
    expect(await ocrBatch([], {}, { config })).toEqual({ total: 0, succeeded: 0, failed: 0, results: [], errors: [] });
  });
});
