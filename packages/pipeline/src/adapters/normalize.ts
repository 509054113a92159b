/**
 * Field-level normalization shared by the adapters
 */

import { z } from 'zod';
import type pino from 'pino';

/**
 * First value that is a finite number, else the fallback
 */
export function num(...candidates: Array<number | null | undefined>): number {
  for (const candidate of candidates) {
    if (typeof candidate === 'number' && Number.isFinite(candidate)) return candidate;
  }
  return 0;
}

/**
 * First finite number rounded to an integer, else 0
 */
export function int(...candidates: Array<number | null | undefined>): number {
  return Math.round(num(...candidates));
}

/**
 * First non-empty string, else ''
 */
export function str(...candidates: Array<string | null | undefined>): string {
  for (const candidate of candidates) {
    if (typeof candidate === 'string' && candidate !== '') return candidate;
  }
  return '';
}

/**
 * Finite number or null, for nullable columns
 */
export function nullable(value: number | null | undefined): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/**
 * Sentiment from positive/negative counts in [-1, 1]; exactly 0 when both are 0
 *
 * @example
 * balanceScore(3, 1) // 0.5
 * balanceScore(0, 0) // 0
 */
export function balanceScore(positive: number, negative: number): number {
  const pos = Math.max(positive, 0);
  const neg = Math.max(negative, 0);
  const total = pos + neg;
  if (total === 0) return 0;
  return (pos - neg) / total;
}

/**
 * Parse one raw provider item; an item that fails the schema degrades to the
 * schema's all-default shape and is logged at debug level
 */
export function parseItem<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  raw: unknown,
  logger: pino.Logger,
  context: Record<string, unknown>
): T {
  const parsed = schema.safeParse(raw);
  if (parsed.success) {
    return parsed.data;
  }
  logger.debug({ ...context, issues: parsed.error.errors.length }, 'Malformed item, using defaults');
  return schema.parse({});
}
