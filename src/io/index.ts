/**
 * Reading user-supplied files.
 *
 * Every failure maps onto the error taxonomy: a missing file is
 * NOT_FOUND, an unreadable one IO_ERROR, and content that is not JSON or
 * does not match its schema VALIDATION_ERROR.
 */

import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { createInterface } from 'readline';
import type { Readable } from 'stream';
import type { z } from 'zod';
import { PipelineAbortedError, PipelineError } from '../runner/errors.js';

export const MAX_INPUT_BYTES = 10 * 1024 * 1024;

export type JsonParseResult = { success: true; data: unknown } | { success: false; error: string };

/**
 * JSON.parse with a size limit and no throwing.
 */
export function safeJsonParse(input: string, maxSize = MAX_INPUT_BYTES): JsonParseResult {
  if (input.length > maxSize) {
    return { success: false, error: `Input exceeds maximum size of ${maxSize} bytes` };
  }

  try {
    return { success: true, data: JSON.parse(input) };
  } catch (err) {
    const message = err instanceof Error ? err.message : 'Invalid JSON';
    return { success: false, error: `JSON parse error: ${message}` };
  }
}

export function validateInputPath(inputPath: string): { valid: true } | { valid: false; error: string } {
  if (inputPath.includes('\0')) return { valid: false, error: 'Path contains null bytes' };
  if (inputPath.trim() === '') return { valid: false, error: 'Path is empty' };
  return { valid: true };
}

export function readTextFile(inputPath: string, label: string): string {
  const check = validateInputPath(inputPath);
  if (!check.valid) throw new PipelineError('VALIDATION_ERROR', `Invalid ${label} path: ${check.error}`);

  const filePath = resolve(inputPath);
  if (!existsSync(filePath)) {
    throw new PipelineError('NOT_FOUND', `${label} not found: ${filePath}`, { path: filePath });
  }

  try {
    return readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new PipelineError('IO_ERROR', `Could not read ${label}: ${err instanceof Error ? err.message : String(err)}`, {
      path: filePath,
    });
  }
}

/**
 * Read, parse and schema-check a JSON file.
 */
export function readJsonFile<T>(inputPath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, label: string): T {
  const parsed = safeJsonParse(readTextFile(inputPath, label));
  if (!parsed.success) throw new PipelineError('VALIDATION_ERROR', `${label}: ${parsed.error}`);

  const result = schema.safeParse(parsed.data);
  if (!result.success) {
    const problems = result.error.errors.map((e) => `${e.path.length ? e.path.join('.') : '$'}: ${e.message}`);
    throw new PipelineError('VALIDATION_ERROR', `${label} is invalid: ${problems.slice(0, 5).join('; ')}`, { problems });
  }
  return result.data;
}

/**
 * Read a description line by line until two consecutive blank lines or
 * end of input. Aborting `signal` closes the reader and rejects with
 * PipelineAbortedError.
 */
export async function readDescription(input: Readable, signal?: AbortSignal): Promise<string> {
  if (signal?.aborted) throw new PipelineAbortedError();

  const rl = createInterface({ input, terminal: false, signal });
  const lines: string[] = [];
  try {
    for await (const line of rl) {
      if (line.trim() === '' && (lines.length === 0 || lines[lines.length - 1].trim() === '')) break;
      lines.push(line);
    }
  } catch (err) {
    if (signal?.aborted) throw new PipelineAbortedError();
    throw err;
  } finally {
    rl.close();
  }
  if (signal?.aborted) throw new PipelineAbortedError();

  const description = lines.join('\n').trim();
  if (!description) throw new PipelineError('VALIDATION_ERROR', 'No project description given');
  return description;
}
