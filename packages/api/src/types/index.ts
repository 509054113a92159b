/**
 * Shared API types and lenient field schemas
 */

import { z } from 'zod';
import type { FetchFailure } from '../errors';

/**
 * Outcome of one executed request: parsed data, or the failure that ended it
 */
export type FetchResult<T> =
  | { ok: true; data: T; retried: boolean }
  | { ok: false; failure: FetchFailure };

export type QueryParams = Record<string, string | number | boolean | undefined>;

// =============================================================================
// Lenient item fields
// =============================================================================
//
// Provider items are parsed field by field: a missing or wrongly typed field
// becomes undefined instead of failing the whole item.

/**
 * Number, or a numeric string; anything else is undefined
 */
export const lenientNumber = () =>
  z
    .preprocess(
      (value) => (typeof value === 'string' && value.trim() !== '' ? Number(value) : value),
      z.number().finite().optional()
    )
    .catch(undefined);

/**
 * Number, null, or undefined - keeps explicit nulls for nullable columns
 */
export const nullableNumber = () => z.number().finite().nullable().optional().catch(undefined);

export const lenientString = () => z.string().optional().catch(undefined);

/**
 * Array of raw items; each element is validated later by the caller
 */
export const rawItems = () => z.array(z.unknown()).optional().catch(undefined);
