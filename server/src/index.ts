#!/usr/bin/env node
import dotenv from 'dotenv';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { loadOcrConfig, SERVER_NAME, SERVER_VERSION } from './ocr/config';
import { errorMessage } from './ocr/errors';
import { ocrLog } from './ocr/ocrLog';
import { createOcrServer } from './tools';

dotenv.config();

async function start() {
  const config = loadOcrConfig();
  const server = createOcrServer({ config });
  const transport = new StdioServerTransport();

  const shutdown = (signal: string) => {
    ocrLog('info', 'shutting down', { signal });
    server.close().then(
      () => process.exit(0),
      (e: unknown) => {
        ocrLog('error', 'close failed', { err: errorMessage(e) });
        process.exit(1);
      },
    );
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await server.connect(transport);
  ocrLog('info', 'server listening on stdio', {
    name: SERVER_NAME,
    version: SERVER_VERSION,
    helperScript: config.helper.script,
    helperBinary: config.helper.binary,
    timeoutMs: config.timeoutMs,
  });
}

start().catch((e: unknown) => {
  ocrLog('error', 'failed to start', { err: errorMessage(e) });
  process.exit(1);
});
