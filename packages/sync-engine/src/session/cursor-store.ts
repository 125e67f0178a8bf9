/**
 * Persisted position of the in-flight paginated query.
 *
 * Written after every non-final page and cleared after the final one, so a restarted process
 * can continue the iterator instead of starting the refresh over.
 */

import { readJsonFile, removeFile, writeJsonFileAtomic } from '../storage/json-file.js';
import { cursorStateSchema, type CursorState } from '../types/index.js';

export class CursorStore {
  constructor(private readonly filePath: string = './.sessions/cursor.json') {}

  async load(): Promise<CursorState | undefined> {
    return readJsonFile(this.filePath, cursorStateSchema, 'CURSOR_ERROR');
  }

  /** Cursor saved for `entityType`, if the file holds one for it */
  async loadFor(entityType: string): Promise<CursorState | undefined> {
    const state = await this.load();
    return state?.entityType === entityType ? state : undefined;
  }

  async save(entityType: string, iteratorID: string, remaining: number): Promise<void> {
    const state: CursorState = { entityType, iteratorID, remaining, savedAt: new Date().toISOString() };
    await writeJsonFileAtomic(this.filePath, state, 'CURSOR_ERROR');
  }

  /** Remove the cursor if it belongs to `entityType` */
  async clear(entityType: string): Promise<void> {
    const state = await this.load();
    if (state?.entityType === entityType) {
      await removeFile(this.filePath);
    }
  }
}
