import { randomUUID } from 'node:crypto';
import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import type { z } from 'zod';
import { formatZodIssues } from '@ledgerlink/core';
import { SyncError, type SyncErrorCode } from '../errors/index.js';

/**
 * Read and validate a JSON document. Returns undefined when the file does not exist.
 */
export async function readJsonFile<T extends z.ZodTypeAny>(
  filePath: string,
  schema: T,
  corruptCode: SyncErrorCode
): Promise<z.infer<T> | undefined> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    if (isNotFound(err)) return undefined;
    throw new SyncError({
      code: corruptCode,
      message: `Failed to read ${filePath}`,
      cause: err instanceof Error ? err : undefined,
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content.replace(/^\uFEFF/, ''));
  } catch (err) {
    throw new SyncError({
      code: corruptCode,
      message: `${filePath} is not valid JSON`,
      cause: err instanceof Error ? err : undefined,
      suggestion: 'Restore the file from backup or delete it to start from an empty state.',
    });
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new SyncError({
      code: corruptCode,
      message: formatZodIssues(`${filePath} has an unexpected shape`, parsed.error),
    });
  }
  return parsed.data;
}

/**
 * Write a JSON document by writing a temp file beside it and renaming it into place,
 * so readers see either the old or the new document, never a partial one.
 */
export async function writeJsonFileAtomic(
  filePath: string,
  data: unknown,
  errorCode: SyncErrorCode
): Promise<void> {
  const dir = path.dirname(filePath);
  const tempPath = path.join(dir, `.${path.basename(filePath)}.${randomUUID()}.tmp`);
  try {
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(tempPath, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (err) {
    await fs.rm(tempPath, { force: true });
    throw new SyncError({
      code: errorCode,
      message: `Failed to write ${filePath}`,
      cause: err instanceof Error ? err : undefined,
    });
  }
}

export async function removeFile(filePath: string): Promise<void> {
  await fs.rm(filePath, { force: true });
}

/** File name safe for any entity tag or ticket */
export function sanitizeFileName(name: string): string {
  return name.replace(/[^a-zA-Z0-9_-]/g, '_');
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
