/**
 * Filename resolution
 *
 * Turns a sender-declared document name into a safe local name and picks a
 * path in the download folder that no existing file occupies.
 */

import { access, open, type FileHandle } from 'node:fs/promises';
import { extname, join, dirname, basename } from 'node:path';
import { UNNAMED_FILE_PLACEHOLDER } from '../config/defaults.js';
import { getErrorCode } from '../types/errors.js';

const INVALID_FILENAME_CHARS = /[/\\:*?"<>|]/g;
const EDGE_SPACES_AND_DOTS = /^[ .]+|[ .]+$/g;

/**
 * Replace path separators and reserved characters with `_`, then strip
 * leading/trailing spaces and dots. Never returns an empty string.
 */
export function sanitizeFilename(name: string): string {
  const cleaned = name.replace(INVALID_FILENAME_CHARS, '_').replace(EDGE_SPACES_AND_DOTS, '');
  return cleaned === '' ? UNNAMED_FILE_PLACEHOLDER : cleaned;
}

/**
 * Lower-case extension without the leading dot ('' when there is none).
 */
export function fileExtension(name: string): string {
  return extname(name).slice(1).toLowerCase();
}

/**
 * Candidate `n` for a path: the path itself for 0, else `name_n.ext`.
 */
export function suffixedPath(path: string, n: number): string {
  if (n === 0) return path;
  const ext = extname(path);
  const stem = basename(path, ext);
  return join(dirname(path), `${stem}_${n}${ext}`);
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch (error) {
    if (getErrorCode(error) === 'ENOENT') return false;
    throw error;
  }
}

async function firstFreeIndex(path: string, from = 0): Promise<number> {
  let n = from;
  while (await exists(suffixedPath(path, n))) n++;
  return n;
}

/**
 * First candidate (`path`, `name_1.ext`, `name_2.ext`, ...) that does not exist.
 * Only a hint: another writer may take the name before it is opened.
 */
export async function makeUniquePath(path: string): Promise<string> {
  return suffixedPath(path, await firstFreeIndex(path));
}

export interface UniqueFile {
  path: string;
  handle: FileHandle;
}

/**
 * Open a new file at the first free candidate of `path`.
 * Creation is exclusive, so a name taken between the check and the open
 * moves on to the next suffix instead of overwriting.
 */
export async function createUniqueFile(path: string): Promise<UniqueFile> {
  let n = await firstFreeIndex(path);

  for (;;) {
    const candidate = suffixedPath(path, n);
    try {
      const handle = await open(candidate, 'wx');
      return { path: candidate, handle };
    } catch (error) {
      if (getErrorCode(error) !== 'EEXIST') throw error;
      n = await firstFreeIndex(path, n + 1);
    }
  }
}
