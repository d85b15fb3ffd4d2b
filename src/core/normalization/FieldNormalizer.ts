import { ABSENT, type NormalizedField } from '../entities/NormalizedField.js';
import { isJsonObject, toJsonValue, type JsonObject, type JsonValue } from '../entities/Json.js';

export type NormalizationWarning = (message: string) => void;

/**
 * Normalize a relation field that Zammad may send as an id, a label,
 * an expanded object or null.
 *
 * Never throws. Shapes that fit none of the variants become `absent`
 * and are reported through `onWarning`.
 */
export function normalizeField(raw: unknown, onWarning?: NormalizationWarning): NormalizedField {
  if (raw === null || raw === undefined) {
    return ABSENT;
  }

  if (typeof raw === 'number') {
    if (isPositiveId(raw)) {
      return { kind: 'id', id: raw };
    }
    onWarning?.(`expected a positive integer id, got ${String(raw)}`);
    return ABSENT;
  }

  if (typeof raw === 'string') {
    return raw.trim() === '' ? ABSENT : { kind: 'label', label: raw };
  }

  if (isJsonObject(raw)) {
    const id = raw.id;
    if (isPositiveId(id)) {
      const converted = toJsonValue(raw);
      const fields: JsonObject = isJsonObject(converted) ? converted : {};
      return { kind: 'brief', id, name: briefName(fields, id), fields };
    }
    onWarning?.('expected an object with a positive integer "id"');
    return ABSENT;
  }

  onWarning?.(`unrecognized field shape: ${describeShape(raw)}`);
  return ABSENT;
}

/**
 * Normalize a list-valued relation field (e.g. organization members).
 * A non-list value yields an empty list.
 */
export function normalizeFieldList(raw: unknown, onWarning?: NormalizationWarning): NormalizedField[] {
  if (raw === null || raw === undefined) {
    return [];
  }
  if (!Array.isArray(raw)) {
    onWarning?.(`expected a list, got ${describeShape(raw)}`);
    return [];
  }
  return raw.map((item: unknown) => normalizeField(item, onWarning));
}

/**
 * Human-facing name for any variant
 */
export function displayName(field: NormalizedField): string {
  switch (field.kind) {
    case 'id':
      return `ID ${field.id}`;
    case 'label':
      return field.label;
    case 'brief':
      return field.name;
    case 'absent':
      return 'N/A';
  }
}

export function fieldId(field: NormalizedField): number | null {
  switch (field.kind) {
    case 'id':
    case 'brief':
      return field.id;
    case 'label':
    case 'absent':
      return null;
  }
}

/**
 * Structured rendering: the caller sees the variant that arrived.
 */
export function fieldToJson(field: NormalizedField): JsonValue {
  switch (field.kind) {
    case 'id':
      return field.id;
    case 'label':
      return field.label;
    case 'brief':
      return { ...field.fields };
    case 'absent':
      return null;
  }
}

export function isPositiveId(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value > 0;
}

function briefName(fields: JsonObject, id: number): string {
  const name = nonEmptyString(fields.name);
  if (name) {
    return name;
  }

  const fullName = [nonEmptyString(fields.firstname), nonEmptyString(fields.lastname)]
    .filter((part): part is string => part !== null)
    .join(' ');
  if (fullName) {
    return fullName;
  }

  return nonEmptyString(fields.login) ?? nonEmptyString(fields.email) ?? `ID ${id}`;
}

function nonEmptyString(value: JsonValue | undefined): string | null {
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

function describeShape(value: unknown): string {
  if (Array.isArray(value)) {
    return `list of ${value.length}`;
  }
  return typeof value;
}
