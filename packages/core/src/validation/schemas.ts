/**
 * Zod schemas for records and references crossing a trust boundary
 * (operator tool input, persisted documents)
 */

import { z } from 'zod';

const FORBIDDEN_RECORD_KEYS = new Set(['__proto__', 'prototype', 'constructor']);

/** Flat or nested entity record; rejects prototype-polluting keys */
export const entityRecordSchema = z
  .record(z.unknown())
  .superRefine((record, ctx) => {
    for (const key of Object.keys(record)) {
      if (FORBIDDEN_RECORD_KEYS.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Unsafe record key: ${key}`,
          path: [key],
        });
      }
    }
  });

export function formatZodIssues(label: string, err: z.ZodError): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `${label}:\n${issues}`;
}
