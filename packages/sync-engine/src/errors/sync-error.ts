/**
 * Sync engine error types
 */

export type SyncErrorCode =
  | 'SNAPSHOT_ERROR'
  | 'SNAPSHOT_CORRUPT'
  | 'SESSION_ERROR'
  | 'SESSION_NOT_FOUND'
  | 'CURSOR_ERROR'
  | 'UNKNOWN_ENTITY'
  | 'STAGING_ERROR';

export interface SyncErrorDetails {
  code: SyncErrorCode;
  message: string;
  suggestion?: string;
  cause?: Error;
  context?: Record<string, unknown>;
}

export class SyncError extends Error {
  readonly code: SyncErrorCode;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: SyncErrorDetails) {
    super(details.message);
    this.name = 'SyncError';
    this.code = details.code;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }
  }

  /**
   * Format error for operator consumption
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];
    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }
    return parts.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}
