/**
 * Session Orchestrator
 *
 * Drives the per-session task queue through the connector's polling lifecycle. The connector
 * decides timing and retries; every call here loads the session by ticket, advances it under a
 * per-ticket lock and writes it back. Nothing thrown inside a cycle reaches the transport.
 */

import { createHash, randomUUID, timingSafeEqual } from 'node:crypto';
import { errorMessage, silentLogger, type Logger } from '@ledgerlink/core';
import type { EntityRegistry } from '@ledgerlink/qbxml';
import type { RequestBuilder } from '../request/index.js';
import type { ResponseReconciler } from '../reconcile/index.js';
import type { CursorStore, SessionStore } from '../session/index.js';
import { KeyedMutex } from '../storage/keyed-mutex.js';
import type { CursorState, Session, SyncTask } from '../types/index.js';
import {
  CONTINUE_PROGRESS,
  createTask,
  DEFAULT_TASK_TEMPLATE,
  progressOf,
  type TaskTemplateEntry,
} from './task-template.js';

/** Second element of the authenticate result on bad credentials ("not valid user") */
export const INVALID_USER = 'nvu';
/** Second element of the authenticate result when there is nothing to do */
export const NOTHING_TO_DO = 'none';
export const NO_ERROR = 'No error';
export const DEFAULT_SESSION_TTL_MS = 60 * 60 * 1000;

export interface ConnectorCredentials {
  username: string;
  password: string;
}

export interface SessionOrchestratorOptions {
  credentials: ConnectorCredentials;
  registry: EntityRegistry;
  sessions: SessionStore;
  builder: RequestBuilder;
  reconciler: ResponseReconciler;
  cursors?: CursorStore;
  /** Company file path returned on authenticate; empty means the one open in the desktop app */
  companyFile?: string;
  taskTemplate?: readonly TaskTemplateEntry[];
  sessionTtlMs?: number;
  serverVersion?: string;
  logger?: Logger;
  /** Current time in ms, injectable for TTL tests */
  clock?: () => number;
}

/** Connector-reported context of a request cycle */
export interface RequestContext {
  companyFile?: string;
  country?: string;
  majorVersion?: string;
  minorVersion?: string;
}

export interface SessionSummary {
  ticket: string;
  username: string;
  createdAt: string;
  lastActivityAt: string;
  companyFile: string | null;
  /** Version the Web Connector reported, e.g. "13.0" */
  qbxmlVersion: string | null;
  taskIndex: number;
  taskCount: number;
  activeTask: string | null;
  lastError: string | null;
  tasks: Array<{ entityType: string; state: SyncTask['state']; requestSeq: number; remaining: number }>;
}

export function invalidTicketMessage(ticket: string): string {
  return `Invalid or expired session ticket: ${ticket}`;
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

export class SessionOrchestrator {
  private readonly logger: Logger;
  private readonly clock: () => number;
  private readonly ttlMs: number;
  private readonly locks = new KeyedMutex();

  constructor(private readonly options: SessionOrchestratorOptions) {
    this.logger = options.logger ?? silentLogger();
    this.clock = options.clock ?? Date.now;
    this.ttlMs = options.sessionTtlMs ?? DEFAULT_SESSION_TTL_MS;

    for (const entry of this.template) {
      options.registry.getOrThrow(entry.entityType);
    }
  }

  private get template(): readonly TaskTemplateEntry[] {
    return this.options.taskTemplate ?? DEFAULT_TASK_TEMPLATE;
  }

  /**
   * Check credentials and open a session. Returns `[ticket, companyFile]`, `[ticket, "none"]`
   * when no tasks are configured, or `["", "nvu"]` on bad credentials.
   */
  async authenticate(username: string, password: string): Promise<[string, string]> {
    const expected = this.options.credentials;
    const userOk = timingSafeEqual(digest(username), digest(expected.username));
    const passOk = timingSafeEqual(digest(password), digest(expected.password));
    if (!userOk || !passOk) {
      this.logger.warn('Authentication rejected', { username });
      return ['', INVALID_USER];
    }

    const now = new Date(this.clock()).toISOString();
    const session: Session = {
      ticket: randomUUID(),
      username,
      tasks: this.template.map(createTask),
      taskIndex: 0,
      createdAt: now,
      lastActivityAt: now,
      lastError: null,
    };
    await this.options.sessions.put(session);
    this.logger.info('Session opened', { ticket: session.ticket, tasks: session.tasks.length });

    if (session.tasks.length === 0) return [session.ticket, NOTHING_TO_DO];
    return [session.ticket, this.options.companyFile ?? ''];
  }

  /**
   * Next request document for the session, or "" when the queue is exhausted or the ticket is
   * unknown or expired
   */
  async getNextRequest(ticket: string, context: RequestContext = {}): Promise<string> {
    return this.locks.runExclusive(ticket, async () => {
      const session = await this.loadLive(ticket);
      if (!session) return '';

      if (context.companyFile) session.companyFile = context.companyFile;
      if (context.country) session.country = context.country;
      if (context.majorVersion) {
        session.qbxmlVersion = `${context.majorVersion}.${context.minorVersion || '0'}`;
      }

      while (session.taskIndex < session.tasks.length) {
        const task = session.tasks[session.taskIndex];
        if (!task) break;
        const log = this.logger.child({ ticket, entityType: task.entityType });

        try {
          await this.resumeFromCursor(task, log);
          const request = await this.options.builder.build(task);
          task.pendingRequest = request.kind;
          if (request.kind === 'mutation') task.mutationsSent = true;
          log.debug('Request issued', { kind: request.kind, requestSeq: task.requestSeq, cursor: task.cursor });
          await this.save(session);
          return request.xml;
        } catch (err) {
          await this.abandonTask(session, task, errorMessage(err), log);
        }
      }

      await this.save(session);
      this.logger.info('Task queue exhausted', { ticket });
      return '';
    });
  }

  /**
   * Apply the connector's response for the active task and report progress: -1 when the
   * connector reported an error, 50 while the task continues, otherwise percent of tasks done
   */
  async submitResponse(ticket: string, response: string, hresult: string, message: string): Promise<number> {
    return this.locks.runExclusive(ticket, async () => {
      const session = await this.loadLive(ticket);
      if (!session) return -1;

      const task = session.tasks[session.taskIndex];
      if (!task) {
        await this.save(session);
        return 100;
      }
      const log = this.logger.child({ ticket, entityType: task.entityType });

      if (hresult.trim() !== '') {
        await this.abandonTask(session, task, `Connector error: ${message || hresult}`, log);
        await this.save(session);
        return -1;
      }

      if (response.trim() === '') {
        log.info('Empty response; task treated as done');
        await this.completeTask(session, task, log);
        await this.save(session);
        return progressOf(session.taskIndex, session.tasks.length);
      }

      try {
        const outcome = await this.options.reconciler.reconcile(task, response);
        switch (outcome.kind) {
          case 'more':
            if (outcome.rejected) session.lastError = `${task.entityType}: ${outcome.rejected}`;
            await this.save(session);
            return CONTINUE_PROGRESS;
          case 'final':
            await this.completeTask(session, task, log);
            break;
          case 'failed':
            await this.abandonTask(session, task, outcome.error, log);
            break;
        }
      } catch (err) {
        await this.abandonTask(session, task, errorMessage(err), log);
      }

      await this.save(session);
      return progressOf(session.taskIndex, session.tasks.length);
    });
  }

  async getLastError(ticket: string): Promise<string> {
    const session = await this.options.sessions.get(ticket);
    if (!session || this.isExpired(session)) return invalidTicketMessage(ticket);
    return session.lastError ?? NO_ERROR;
  }

  /**
   * The connector could not reach the desktop application. Returns "done" so it stops.
   */
  async connectionError(ticket: string, hresult: string, message: string): Promise<string> {
    return this.locks.runExclusive(ticket, async () => {
      const session = await this.options.sessions.get(ticket);
      if (session) {
        session.lastError = `Connection error: ${message || hresult}`;
        await this.save(session);
      }
      this.logger.warn('Connector reported connection error', { ticket, hresult, message });
      return 'done';
    });
  }

  /**
   * Remove the session. Closing an unknown ticket is not an error.
   */
  async close(ticket: string): Promise<string> {
    return this.locks.runExclusive(ticket, async () => {
      await this.options.sessions.delete(ticket);
      this.logger.info('Session closed', { ticket });
      return 'OK';
    });
  }

  serverVersion(): string {
    return this.options.serverVersion ?? '';
  }

  /** Any connector version is accepted */
  clientVersion(version: string): string {
    this.logger.debug('Connector version', { version });
    return '';
  }

  /**
   * Live sessions and where each stands
   */
  async status(): Promise<SessionSummary[]> {
    const sessions = await this.options.sessions.list();
    return sessions
      .filter((session) => !this.isExpired(session))
      .map((session) => ({
        ticket: session.ticket,
        username: session.username,
        createdAt: session.createdAt,
        lastActivityAt: session.lastActivityAt,
        companyFile: session.companyFile ?? null,
        qbxmlVersion: session.qbxmlVersion ?? null,
        taskIndex: session.taskIndex,
        taskCount: session.tasks.length,
        activeTask: session.tasks[session.taskIndex]?.entityType ?? null,
        lastError: session.lastError,
        tasks: session.tasks.map((task) => ({
          entityType: task.entityType,
          state: task.state,
          requestSeq: task.requestSeq,
          remaining: task.remaining,
        })),
      }));
  }

  private isExpired(session: Session): boolean {
    return this.clock() - Date.parse(session.lastActivityAt) > this.ttlMs;
  }

  /**
   * Session for a ticket, or undefined when unknown or expired. Expired sessions are removed
   * and never revived.
   */
  private async loadLive(ticket: string): Promise<Session | undefined> {
    const session = await this.options.sessions.get(ticket);
    if (!session) {
      this.logger.warn('Unknown session ticket', { ticket });
      return undefined;
    }
    if (this.isExpired(session)) {
      await this.options.sessions.delete(ticket);
      this.logger.warn('Session expired', { ticket, lastActivityAt: session.lastActivityAt });
      return undefined;
    }
    return session;
  }

  private async save(session: Session): Promise<void> {
    session.lastActivityAt = new Date(this.clock()).toISOString();
    await this.options.sessions.put(session);
  }

  /**
   * A task that starts from scratch continues a cursor persisted for its entity type by an
   * interrupted session
   */
  private async resumeFromCursor(task: SyncTask, log: Logger): Promise<void> {
    const cursors = this.options.cursors;
    if (!cursors || task.cursor || task.state !== 'awaiting_first_page' || task.mutationsSent) return;

    let saved: CursorState | undefined;
    try {
      saved = await cursors.loadFor(task.entityType);
    } catch (err) {
      log.warn('Persisted cursor unreadable; starting over', { error: errorMessage(err) });
      return;
    }
    if (!saved) return;

    task.cursor = saved.iteratorID;
    task.remaining = saved.remaining;
    task.state = 'awaiting_next_page';
    task.resumed = true;
    log.info('Resuming paginated query from persisted cursor', { remaining: saved.remaining });
  }

  private async completeTask(session: Session, task: SyncTask, log: Logger): Promise<void> {
    task.state = 'complete';
    task.pendingRequest = null;
    task.cursor = null;
    task.accumulator = {};
    session.taskIndex += 1;
    await this.clearCursor(task, log);
  }

  private async abandonTask(session: Session, task: SyncTask, cause: string, log: Logger): Promise<void> {
    const error = `${task.entityType}: ${cause}`;
    task.state = 'error';
    task.error = error;
    task.pendingRequest = null;
    task.cursor = null;
    task.accumulator = {};
    session.lastError = error;
    session.taskIndex += 1;
    log.error('Task abandoned', { error });
    await this.clearCursor(task, log);
  }

  /** An iterator the task no longer follows must not be resumed by a later session */
  private async clearCursor(task: SyncTask, log: Logger): Promise<void> {
    try {
      await this.options.cursors?.clear(task.entityType);
    } catch (err) {
      log.warn('Persisted cursor could not be cleared', { error: errorMessage(err) });
    }
  }
}
