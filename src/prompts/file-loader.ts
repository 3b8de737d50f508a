/**
 * File-backed prompt loader used when the registry cannot supply a prompt
 */

import { readFile } from 'fs/promises';
import { isAbsolute, resolve } from 'path';
import { Failure, Success, type Result } from '../types/core';
import { FileNotFoundError, IOError, errorMessage, toError } from '../lib/errors';

export type FileReadError = FileNotFoundError | IOError;

/**
 * Errno code of a failed fs call. Checked structurally: fs errors raised in
 * another realm are not instances of this realm's Error.
 */
export function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Resolve a prompt file path against the prompts directory
 */
export function resolvePromptPath(filePath: string, baseDir?: string): string {
  if (isAbsolute(filePath) || !baseDir) {
    return resolve(filePath);
  }
  return resolve(baseDir, filePath);
}

/**
 * Read a whole prompt file as UTF-8.
 * Prompt files are a few KB at most, so there is no streaming.
 */
export async function readPromptFile(
  filePath: string,
  baseDir?: string,
): Promise<Result<string, FileReadError>> {
  const fullPath = resolvePromptPath(filePath, baseDir);

  let raw: Buffer;
  try {
    raw = await readFile(fullPath);
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return Failure(new FileNotFoundError(filePath, toError(error)));
    }
    return Failure(new IOError(filePath, errnoCode(error) ?? errorMessage(error), toError(error)));
  }

  try {
    return Success(new TextDecoder('utf-8', { fatal: true }).decode(raw));
  } catch (error) {
    return Failure(new IOError(filePath, 'content is not valid UTF-8', toError(error)));
  }
}
