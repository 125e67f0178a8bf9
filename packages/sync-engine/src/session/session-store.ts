/**
 * Session State Store
 *
 * Sessions are looked up, written and removed by ticket. Stores hand out copies, so a caller
 * holding one session can never observe or corrupt another caller's state.
 */

import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { readJsonFile, removeFile, sanitizeFileName, writeJsonFileAtomic } from '../storage/json-file.js';
import { sessionSchema, type Session } from '../types/index.js';

export interface SessionStore {
  get(ticket: string): Promise<Session | undefined>;
  put(session: Session): Promise<void>;
  delete(ticket: string): Promise<void>;
  list(): Promise<Session[]>;
}

export class MemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, Session>();

  async get(ticket: string): Promise<Session | undefined> {
    const session = this.sessions.get(ticket);
    return session ? structuredClone(session) : undefined;
  }

  async put(session: Session): Promise<void> {
    this.sessions.set(session.ticket, structuredClone(session));
  }

  async delete(ticket: string): Promise<void> {
    this.sessions.delete(ticket);
  }

  async list(): Promise<Session[]> {
    return Array.from(this.sessions.values(), (session) => structuredClone(session));
  }
}

/**
 * One JSON file per ticket; sessions survive process restarts
 */
export class FileSessionStore implements SessionStore {
  constructor(private readonly baseDir: string = './.sessions') {}

  private filePath(ticket: string): string {
    return path.join(this.baseDir, `${sanitizeFileName(ticket)}.json`);
  }

  async get(ticket: string): Promise<Session | undefined> {
    const session = await readJsonFile(this.filePath(ticket), sessionSchema, 'SESSION_ERROR');
    return session?.ticket === ticket ? session : undefined;
  }

  async put(session: Session): Promise<void> {
    await writeJsonFileAtomic(this.filePath(session.ticket), session, 'SESSION_ERROR');
  }

  async delete(ticket: string): Promise<void> {
    await removeFile(this.filePath(ticket));
  }

  async list(): Promise<Session[]> {
    let files: string[];
    try {
      files = await fs.readdir(this.baseDir);
    } catch {
      return [];
    }

    const sessions: Session[] = [];
    for (const file of files) {
      if (!file.endsWith('.json') || file.startsWith('.')) continue;
      const session = await readJsonFile(path.join(this.baseDir, file), sessionSchema, 'SESSION_ERROR');
      if (session) sessions.push(session);
    }
    return sessions.sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }
}
