import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import { SERVER_NAME, SERVER_VERSION } from './ocr/config';
import { compileHelper } from './ocr/compileHelper';
import { errorMessage, ok } from './ocr/errors';
import { ocrBatch } from './ocr/ocrBatch';
import { ocrLog } from './ocr/ocrLog';
import { ocrImage, ocrText, type OcrDeps } from './ocr/ocrService';
import type { OcrFailure, OcrOutcome, RecognitionOptions } from './ocr/types';

export const SERVER_INSTRUCTIONS =
  'OCR images on macOS with Vision framework. ' +
  'Use ocr_image for one image, ocr_batch for many images, and ocr_text for plain text output.';

// Level and confidence stay loosely typed here; the OCR layer validates them.
const recognitionShape = {
  languages: z.array(z.string()).nullable().optional()
    .describe('Recognition languages in priority order (BCP 47). Null or empty means ja-JP, en-US.'),
  recognition_level: z.string().optional()
    .describe('"accurate" (default) or "fast".'),
  language_correction: z.boolean().optional()
    .describe('Apply language correction. Default true.'),
  sort_reading_order: z.boolean().optional()
    .describe('Sort lines top-to-bottom, left-to-right. Default true.'),
  min_confidence: z.number().optional()
    .describe('Drop lines below this confidence, 0.0 to 1.0. Default 0.0.'),
};

type RecognitionArgs = {
  languages?: string[] | null;
  recognition_level?: string;
  language_correction?: boolean;
  sort_reading_order?: boolean;
  min_confidence?: number;
};

export function toRecognitionOptions(args: RecognitionArgs): RecognitionOptions {
  return {
    languages: args.languages,
    recognitionLevel: args.recognition_level,
    languageCorrection: args.language_correction,
    sortReadingOrder: args.sort_reading_order,
    minConfidence: args.min_confidence,
  };
}

function textResult(text: string): CallToolResult {
  return { content: [{ type: 'text', text }] };
}

function jsonResult(value: Record<string, unknown>): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(value, null, 2) }],
    structuredContent: value,
  };
}

function failureResult(tool: string, failure: Pick<OcrFailure, 'code' | 'message'>): CallToolResult {
  ocrLog('info', 'tool failed', { tool, code: failure.code, message: failure.message });
  return { content: [{ type: 'text', text: failure.message }], isError: true };
}

async function respond<T>(tool: string, work: () => Promise<OcrOutcome<T>>, render: (value: T) => CallToolResult): Promise<CallToolResult> {
  try {
    const outcome = await work();
    if (outcome.ok !== true) return failureResult(tool, outcome);
    return render(outcome.value);
  } catch (e) {
    ocrLog('error', 'tool crashed', { tool, err: errorMessage(e) });
    return { content: [{ type: 'text', text: errorMessage(e) }], isError: true };
  }
}

export function registerOcrTools(server: McpServer, deps: OcrDeps): void {
  server.tool(
    'ocr_image',
    'Run OCR for a single image with Apple Vision and return structured output ' +
      '(lines, confidence, bounding boxes, full text).',
    { path: z.string().describe('Image file path. "~" and relative paths are accepted.'), ...recognitionShape },
    async ({ path, ...rest }) => respond('ocr_image', () => ocrImage(path, toRecognitionOptions(rest), deps), jsonResult),
  );

  server.tool(
    'ocr_batch',
    'Run OCR for multiple images. Returns per-image results plus an error list for files that failed.',
    { paths: z.array(z.string()).describe('Image file paths, processed in order.'), ...recognitionShape },
    async ({ paths, ...rest }) =>
      respond(
        'ocr_batch',
        async () => ok(await ocrBatch(paths, toRecognitionOptions(rest), deps)),
        jsonResult,
      ),
  );

  server.tool(
    'ocr_text',
    'Run OCR for a single image and return plain text only (newline-separated). ' +
      'Useful when structured metadata is unnecessary.',
    { path: z.string().describe('Image file path. "~" and relative paths are accepted.'), ...recognitionShape },
    async ({ path, ...rest }) => respond('ocr_text', () => ocrText(path, toRecognitionOptions(rest), deps), textResult),
  );

  server.tool(
    'compile_helper',
    'Compile the Swift helper to a native binary for faster OCR calls. ' +
      'By default the server runs the Swift script directly.',
    async () => respond('compile_helper', () => compileHelper(deps), jsonResult),
  );
}

export function createOcrServer(deps: OcrDeps): McpServer {
  const server = new McpServer(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { instructions: SERVER_INSTRUCTIONS },
  );
  registerOcrTools(server, deps);
  return server;
}
