/**
 * Session persistence
 *
 * The authenticated login state is one opaque string kept in a file readable
 * only by its owner. A missing file means "log in again".
 */

import { mkdir, readFile, writeFile, chmod } from 'node:fs/promises';
import { dirname } from 'node:path';
import { getErrorCode } from '@docdrop/core';

const SESSION_FILE_MODE = 0o600;

export class SessionStore {
  constructor(readonly path: string) {}

  /**
   * Stored session string, or '' when none was saved yet.
   */
  async load(): Promise<string> {
    try {
      return (await readFile(this.path, 'utf8')).trim();
    } catch (error) {
      if (getErrorCode(error) === 'ENOENT') return '';
      throw error;
    }
  }

  async save(session: string): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(this.path, session, { mode: SESSION_FILE_MODE });
    // writeFile only applies the mode when it creates the file
    await chmod(this.path, SESSION_FILE_MODE);
  }
}
