import { promises as fs } from 'node:fs';
import type { z } from 'zod';
import { ConnectorError, errorMessage, formatZodIssues } from '@ledgerlink/core';

/**
 * Read a JSON configuration document and validate it. Returns undefined when the file does
 * not exist; an unreadable or invalid file is a configuration error.
 */
export async function loadJsonDocument<T extends z.ZodTypeAny>(
  filePath: string,
  schema: T,
  label: string
): Promise<z.infer<T> | undefined> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return undefined;
    throw new ConnectorError({
      code: 'CONFIGURATION_ERROR',
      message: `Failed to read ${label} ${filePath}: ${errorMessage(err)}`,
      cause: err instanceof Error ? err : undefined,
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content.replace(/^\uFEFF/, ''));
  } catch (err) {
    throw new ConnectorError({
      code: 'CONFIGURATION_ERROR',
      message: `${label} ${filePath} is not valid JSON: ${errorMessage(err)}`,
    });
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ConnectorError({
      code: 'CONFIGURATION_ERROR',
      message: formatZodIssues(`Invalid ${label} ${filePath}`, parsed.error),
    });
  }
  return parsed.data;
}
