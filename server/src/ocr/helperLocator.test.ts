import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { locateHelper } from './helperLocator';

describe('locateHelper', () => {
  let dir: string;
  let script: string;
  let binary: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'vision-ocr-helper-'));
    script = path.join(dir, 'vision_ocr.swift');
    binary = path.join(dir, '.build', 'vision_ocr');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('prefers an executable compiled binary', async () => {
    await fs.writeFile(script, '// helper');
    await fs.mkdir(path.dirname(binary));
    await fs.writeFile(binary, '#!/bin/sh\n');
    await fs.chmod(binary, 0o755);

    expect(await locateHelper({ script, binary })).toEqual({
      ok: true,
      value: { kind: 'binary', command: [binary] },
    });
  });

  it('falls back to the script when the binary is not executable', async () => {
    await fs.writeFile(script, '// helper');
    await fs.mkdir(path.dirname(binary));
    await fs.writeFile(binary, 'stale');
    await fs.chmod(binary, 0o644);

    expect(await locateHelper({ script, binary })).toEqual({
      ok: true,
      value: { kind: 'script', command: ['xcrun', 'swift', script] },
    });
  });

  it('falls back to the script when no binary was built', async () => {
    await fs.writeFile(script, '// helper');

    const res = await locateHelper({ script, binary });
    expect(res.ok === true && res.value.command).toEqual(['xcrun', 'swift', script]);
  });

  it('fails with HELPER_MISSING when neither exists', async () => {
    expect(await locateHelper({ script, binary })).toMatchObject({
      ok: false,
      code: 'HELPER_MISSING',
      message: `Swift helper script not found: ${script}`,
    });
  });
});
