/**
 * Record types.
 */

import type { Value } from './value.js';

/**
 * One table record: attribute name to typed value. Names are case-sensitive.
 */
export type Item = Record<string, Value>;

/**
 * The primary-key attributes of a record.
 */
export type Key = Item;
