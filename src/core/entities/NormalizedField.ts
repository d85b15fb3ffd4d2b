import type { JsonObject } from './Json.js';

/**
 * A relation field as Zammad may send it: a bare id, a short label,
 * an expanded object, or nothing at all.
 */
export type NormalizedField =
  | { readonly kind: 'id'; readonly id: number }
  | { readonly kind: 'label'; readonly label: string }
  | { readonly kind: 'brief'; readonly id: number; readonly name: string; readonly fields: Readonly<JsonObject> }
  | { readonly kind: 'absent' };

export type NormalizedFieldKind = NormalizedField['kind'];

export const ABSENT: NormalizedField = Object.freeze({ kind: 'absent' });
