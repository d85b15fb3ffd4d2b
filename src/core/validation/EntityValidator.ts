import { z } from 'zod';
import { buildEntitySchemas, type EntitySchemas, type UnknownKeys } from './entitySchemas.js';
import { parseFields as parse } from './fieldErrors.js';
import { ValidationError } from '../../infrastructure/errors/ValidationError.js';
import { normalizeField, normalizeFieldList } from '../normalization/FieldNormalizer.js';
import { isJsonObject, toJsonValue, type JsonObject } from '../entities/Json.js';
import type { NormalizedField } from '../entities/NormalizedField.js';
import type { EntityMap } from '../entities/Entity.js';
import type { Article, Attachment, Ticket } from '../entities/Ticket.js';
import type { ArticleCreate, AttachmentUpload, TicketCreate, TicketUpdate } from '../entities/Inputs.js';

/** Everything the validator can build: remote entities plus caller inputs */
export interface ValidatedMap extends EntityMap {
  ticket_create: TicketCreate;
  ticket_update: TicketUpdate;
  article_create: ArticleCreate;
  attachment_upload: AttachmentUpload;
}

export type ValidatedKind = keyof ValidatedMap;

export interface ValidateOptions {
  /** Unknown-key policy (default: reject) */
  unknownKeys?: UnknownKeys;
  /** Receives normalization warnings for relation fields */
  onWarning?: (message: string) => void;
  /** Receives top-level keys dropped under the strip policy */
  onDroppedKeys?: (kind: ValidatedKind, keys: string[]) => void;
}

export type SafeValidateResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: ValidationError };

const SCHEMAS: Readonly<Record<UnknownKeys, EntitySchemas>> = {
  reject: buildEntitySchemas('reject'),
  strip: buildEntitySchemas('strip')
};

interface BuildContext {
  readonly schemas: EntitySchemas;
  normalize(raw: unknown, field: string): NormalizedField;
  normalizeList(raw: unknown, field: string): NormalizedField[];
}

type Builder<K extends ValidatedKind> = (raw: unknown, ctx: BuildContext) => ValidatedMap[K];

/**
 * Run `build` and re-scope any field issues under `prefix`
 */
export function nested<T>(prefix: string, build: () => T): T {
  try {
    return build();
  } catch (error) {
    if (error instanceof ValidationError) {
      const [first, ...rest] = error.issues.map(issue => ({
        field: issue.field === 'input' ? prefix : `${prefix}.${issue.field}`,
        reason: issue.reason
      }));
      if (first) {
        throw new ValidationError([first, ...rest]);
      }
    }
    throw error;
  }
}

function scopedWarning(
  onWarning: ((message: string) => void) | undefined,
  field: string
): ((message: string) => void) | undefined {
  if (!onWarning) {
    return undefined;
  }
  return (message: string) => onWarning(`${field}: ${message}`);
}

function toJsonObject(value: Record<string, unknown> | undefined): JsonObject | undefined {
  if (value === undefined) {
    return undefined;
  }
  const converted = toJsonValue(value);
  return isJsonObject(converted) ? converted : {};
}

function buildAttachment(data: z.output<EntitySchemas['attachment']>): Attachment {
  return { ...data, preferences: toJsonObject(data.preferences) };
}

function buildArticle(raw: unknown, ctx: BuildContext): Article {
  const data = parse(ctx.schemas.article, raw);
  return {
    ...data,
    created_by: ctx.normalize(data.created_by, 'created_by'),
    updated_by: ctx.normalize(data.updated_by, 'updated_by'),
    attachments: data.attachments?.map(buildAttachment)
  };
}

function buildTicket(raw: unknown, ctx: BuildContext): Ticket {
  const { articles, ...data } = parse(ctx.schemas.ticket, raw);
  const ticket: Ticket = {
    ...data,
    group: ctx.normalize(data.group, 'group'),
    state: ctx.normalize(data.state, 'state'),
    priority: ctx.normalize(data.priority, 'priority'),
    customer: ctx.normalize(data.customer, 'customer'),
    owner: ctx.normalize(data.owner, 'owner'),
    organization: ctx.normalize(data.organization, 'organization'),
    created_by: ctx.normalize(data.created_by, 'created_by'),
    updated_by: ctx.normalize(data.updated_by, 'updated_by')
  };
  if (articles === undefined) {
    return ticket;
  }
  return {
    ...ticket,
    articles: articles.map((article, index) => nested(`articles[${index}]`, () => buildArticle(article, ctx)))
  };
}

const BUILDERS: { readonly [K in ValidatedKind]: Builder<K> } = {
  ticket: buildTicket,
  article: buildArticle,
  user: (raw, ctx) => {
    const data = parse(ctx.schemas.user, raw);
    return {
      ...data,
      organization: ctx.normalize(data.organization, 'organization'),
      created_by: ctx.normalize(data.created_by, 'created_by'),
      updated_by: ctx.normalize(data.updated_by, 'updated_by')
    };
  },
  organization: (raw, ctx) => {
    const data = parse(ctx.schemas.organization, raw);
    return {
      ...data,
      created_by: ctx.normalize(data.created_by, 'created_by'),
      updated_by: ctx.normalize(data.updated_by, 'updated_by'),
      members: data.members === undefined ? undefined : ctx.normalizeList(data.members, 'members')
    };
  },
  group: (raw, ctx) => parse(ctx.schemas.group, raw),
  state: (raw, ctx) => parse(ctx.schemas.state, raw),
  priority: (raw, ctx) => parse(ctx.schemas.priority, raw),
  attachment: (raw, ctx) => buildAttachment(parse(ctx.schemas.attachment, raw)),
  ticket_create: (raw, ctx) => parse(ctx.schemas.ticket_create, raw),
  ticket_update: (raw, ctx) => parse(ctx.schemas.ticket_update, raw),
  article_create: (raw, ctx) => parse(ctx.schemas.article_create, raw),
  attachment_upload: (raw, ctx) => parse(ctx.schemas.attachment_upload, raw)
};

/**
 * Top-level keys of `raw` the schema for `kind` does not name
 */
function droppedKeys(kind: ValidatedKind, schemas: EntitySchemas, raw: unknown): string[] {
  if (!isJsonObject(raw)) {
    return [];
  }
  const schema = schemas[kind];
  if (!(schema instanceof z.ZodObject)) {
    return [];
  }
  const known = new Set(Object.keys(schema.shape));
  return Object.keys(raw).filter(key => !known.has(key));
}

/**
 * Validate raw JSON into a typed entity or caller input.
 *
 * Free text is escaped and relation fields normalized during construction.
 *
 * @throws ValidationError with one issue per violated constraint
 */
export function validate<K extends ValidatedKind>(kind: K, raw: unknown, options: ValidateOptions = {}): ValidatedMap[K] {
  const unknownKeys = options.unknownKeys ?? 'reject';
  const schemas = SCHEMAS[unknownKeys];
  const onWarning = options.onWarning;

  const ctx: BuildContext = {
    schemas,
    normalize: (value, field) => normalizeField(value, scopedWarning(onWarning, field)),
    normalizeList: (value, field) => normalizeFieldList(value, scopedWarning(onWarning, field))
  };

  const build: Builder<K> = BUILDERS[kind];
  const value = build(raw, ctx);

  if (unknownKeys === 'strip' && options.onDroppedKeys) {
    const dropped = droppedKeys(kind, schemas, raw);
    if (dropped.length > 0) {
      options.onDroppedKeys(kind, dropped);
    }
  }

  return value;
}

/**
 * Non-throwing variant of {@link validate}
 */
export function safeValidate<K extends ValidatedKind>(
  kind: K,
  raw: unknown,
  options: ValidateOptions = {}
): SafeValidateResult<ValidatedMap[K]> {
  try {
    return { ok: true, value: validate(kind, raw, options) };
  } catch (error) {
    if (error instanceof ValidationError) {
      return { ok: false, error };
    }
    throw error;
  }
}

/**
 * Validate every element of a list, scoping issues as `[i].field`
 */
export function validateList<K extends ValidatedKind>(
  kind: K,
  raw: readonly unknown[],
  options: ValidateOptions = {}
): ValidatedMap[K][] {
  return raw.map((item, index) => nested(`[${index}]`, () => validate(kind, item, options)));
}
