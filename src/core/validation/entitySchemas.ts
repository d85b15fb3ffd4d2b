import { z } from 'zod';
import { escapeMarkup } from './escapeMarkup.js';
import {
  MAX_ARTICLE_BODY_LENGTH,
  MAX_ATTACHMENTS,
  MAX_FILENAME_LENGTH
} from '../../constants.js';
import { guessMimeType, isValidBase64, MIME_TYPE_PATTERN, sanitizeFilename } from '../../utils/attachments.js';

/**
 * `reject` fails on keys the schema does not name; `strip` drops them.
 */
export type UnknownKeys = 'reject' | 'strip';

export const MAX_TITLE_LENGTH = 200;
export const MAX_GROUP_LENGTH = 100;
export const MAX_CUSTOMER_LENGTH = 255;
export const MAX_REFERENCE_LENGTH = 255;

// ============================================================================
// Building blocks
// ============================================================================

const id = () => z.number().int().positive();
const optionalId = () => id().nullish();
const timestamp = () => z.string().datetime({ offset: true });
const optionalTimestamp = () => timestamp().nullish();
const optionalString = () => z.string().nullish();
const optionalFlag = () => z.boolean().optional();

/** Free text, escaped once at construction */
const text = (max?: number) => {
  const base = max === undefined ? z.string() : z.string().max(max);
  return base.transform(escapeMarkup);
};

/** Relation field handed to FieldNormalizer after parsing */
const ambiguous = () => z.unknown();

// Ticket number arrives as a string, some installations send an integer
const ticketNumber = () =>
  z.union([z.string().min(1), z.number().int().nonnegative()]).transform(value => String(value));

// Attachment sizes arrive as numeric strings
const byteSize = () =>
  z.union([z.number().int().nonnegative(), z.string().regex(/^\d+$/).transform(Number)]).nullish();

function objectWith<T extends z.ZodRawShape>(shape: T, unknownKeys: UnknownKeys): z.ZodObject<T, z.UnknownKeysParam> {
  return unknownKeys === 'reject' ? z.object(shape).strict() : z.object(shape).strip();
}

// ============================================================================
// Shapes
// ============================================================================

const auditShape = {
  created_by_id: optionalId(),
  updated_by_id: optionalId(),
  created_at: timestamp(),
  updated_at: timestamp()
};

const ticketShape = {
  id: id(),
  number: ticketNumber(),
  title: text(),
  group_id: id(),
  state_id: id(),
  priority_id: id(),
  customer_id: id(),
  owner_id: optionalId(),
  organization_id: optionalId(),
  ...auditShape,
  pending_time: optionalTimestamp(),
  first_response_at: optionalTimestamp(),
  first_response_escalation_at: optionalTimestamp(),
  close_at: optionalTimestamp(),
  close_escalation_at: optionalTimestamp(),
  update_escalation_at: optionalTimestamp(),
  escalation_at: optionalTimestamp(),
  last_contact_at: optionalTimestamp(),
  last_contact_agent_at: optionalTimestamp(),
  last_contact_customer_at: optionalTimestamp(),
  article_count: z.number().int().nonnegative().nullish(),
  group: ambiguous(),
  state: ambiguous(),
  priority: ambiguous(),
  customer: ambiguous(),
  owner: ambiguous(),
  organization: ambiguous(),
  created_by: ambiguous(),
  updated_by: ambiguous(),
  articles: z.array(z.unknown()).optional()
};

const attachmentShape = {
  id: id(),
  filename: z.string().min(1).max(MAX_FILENAME_LENGTH),
  size: byteSize(),
  content_type: optionalString(),
  preferences: z.record(z.unknown()).optional(),
  created_at: optionalTimestamp()
};

const userShape = {
  id: id(),
  organization_id: optionalId(),
  login: optionalString(),
  email: optionalString(),
  firstname: optionalString(),
  lastname: optionalString(),
  phone: optionalString(),
  mobile: optionalString(),
  web: optionalString(),
  department: optionalString(),
  vip: optionalFlag(),
  verified: optionalFlag(),
  active: optionalFlag(),
  note: text().nullish(),
  last_login: optionalTimestamp(),
  out_of_office: optionalFlag(),
  ...auditShape,
  organization: ambiguous(),
  created_by: ambiguous(),
  updated_by: ambiguous()
};

const organizationShape = {
  id: id(),
  name: z.string().min(1),
  shared: optionalFlag(),
  domain: optionalString(),
  domain_assignment: optionalFlag(),
  active: optionalFlag(),
  note: text().nullish(),
  member_ids: z.array(id()).optional(),
  ...auditShape,
  created_by: ambiguous(),
  updated_by: ambiguous(),
  members: ambiguous()
};

const groupShape = {
  id: id(),
  name: z.string().min(1),
  assignment_timeout: z.number().int().nonnegative().nullish(),
  follow_up_possible: optionalString(),
  follow_up_assignment: optionalFlag(),
  email_address_id: optionalId(),
  signature_id: optionalId(),
  note: text().nullish(),
  active: optionalFlag(),
  ...auditShape
};

const stateShape = {
  id: id(),
  name: z.string().min(1),
  state_type_id: id(),
  next_state_id: optionalId(),
  ignore_escalation: optionalFlag(),
  default_create: optionalFlag(),
  default_follow_up: optionalFlag(),
  note: text().nullish(),
  active: optionalFlag(),
  ...auditShape
};

const priorityShape = {
  id: id(),
  name: z.string().min(1),
  default_create: optionalFlag(),
  ui_icon: optionalString(),
  ui_color: optionalString(),
  note: text().nullish(),
  active: optionalFlag(),
  ...auditShape
};

export const ARTICLE_TYPES = ['note', 'email', 'phone'] as const;
export const ARTICLE_SENDERS = ['Agent', 'Customer', 'System'] as const;
export const ARTICLE_CONTENT_TYPES = ['text/plain', 'text/html'] as const;

const sanitizedFilename = () =>
  z.string()
    .min(1)
    .max(MAX_FILENAME_LENGTH)
    .transform((value, ctx) => {
      const sanitized = sanitizeFilename(value);
      if (sanitized === null) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `does not name a file, got ${JSON.stringify(value)}` });
        return z.NEVER;
      }
      return sanitized;
    });

const ticketUpdateFields = ['title', 'state', 'priority', 'owner', 'group', 'pending_time'] as const;

// ============================================================================
// Schema sets
// ============================================================================

/**
 * Build the schema for every entity and input kind with the given
 * unknown-key policy.
 */
export function buildEntitySchemas(unknownKeys: UnknownKeys) {
  const attachment = objectWith(attachmentShape, unknownKeys);

  const article = objectWith({
    id: id(),
    ticket_id: id(),
    type: optionalString(),
    sender: optionalString(),
    from: optionalString(),
    to: optionalString(),
    cc: optionalString(),
    subject: text().nullish(),
    body: text(),
    content_type: optionalString(),
    internal: optionalFlag(),
    created_by_id: optionalId(),
    updated_by_id: optionalId(),
    created_at: timestamp(),
    updated_at: optionalTimestamp(),
    created_by: ambiguous(),
    updated_by: ambiguous(),
    attachments: z.array(attachment).optional()
  }, unknownKeys);

  const attachmentUpload = objectWith({
    filename: sanitizedFilename(),
    data: z.string().refine(isValidBase64, 'invalid base64 encoding'),
    mime_type: z.string().regex(MIME_TYPE_PATTERN, 'must be a MIME type such as text/plain').optional()
  }, unknownKeys).transform(upload => ({
    filename: upload.filename,
    data: upload.data,
    mime_type: upload.mime_type ?? guessMimeType(upload.filename)
  }));

  const ticketCreate = objectWith({
    title: z.string().min(1).max(MAX_TITLE_LENGTH).transform(escapeMarkup),
    group: z.string().min(1).max(MAX_GROUP_LENGTH),
    customer: z.string().min(1).max(MAX_CUSTOMER_LENGTH),
    article_body: z.string().min(1).max(MAX_ARTICLE_BODY_LENGTH).transform(escapeMarkup),
    state: z.string().min(1).max(MAX_REFERENCE_LENGTH).default('new'),
    priority: z.string().min(1).max(MAX_REFERENCE_LENGTH).default('2 normal'),
    article_type: z.enum(ARTICLE_TYPES).default('note'),
    article_internal: z.boolean().default(false)
  }, unknownKeys);

  const ticketUpdate = objectWith({
    ticket_id: id(),
    title: z.string().min(1).max(MAX_TITLE_LENGTH).transform(escapeMarkup).optional(),
    state: z.string().min(1).max(MAX_REFERENCE_LENGTH).optional(),
    priority: z.string().min(1).max(MAX_REFERENCE_LENGTH).optional(),
    owner: z.string().min(1).max(MAX_REFERENCE_LENGTH).optional(),
    group: z.string().min(1).max(MAX_GROUP_LENGTH).optional(),
    pending_time: timestamp().optional()
  }, unknownKeys).superRefine((update, ctx) => {
    if (ticketUpdateFields.every(field => update[field] === undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `at least one of ${ticketUpdateFields.join(', ')} is required`
      });
    }
  });

  const articleCreate = objectWith({
    ticket_id: id(),
    body: z.string().min(1).max(MAX_ARTICLE_BODY_LENGTH).transform(escapeMarkup),
    type: z.enum(ARTICLE_TYPES).default('note'),
    internal: z.boolean().default(false),
    sender: z.enum(ARTICLE_SENDERS).default('Agent'),
    content_type: z.enum(ARTICLE_CONTENT_TYPES).default('text/plain'),
    attachments: z.array(attachmentUpload).max(MAX_ATTACHMENTS).default([])
  }, unknownKeys);

  return {
    ticket: objectWith(ticketShape, unknownKeys),
    article,
    user: objectWith(userShape, unknownKeys),
    organization: objectWith(organizationShape, unknownKeys),
    group: objectWith(groupShape, unknownKeys),
    state: objectWith(stateShape, unknownKeys),
    priority: objectWith(priorityShape, unknownKeys),
    attachment,
    ticket_create: ticketCreate,
    ticket_update: ticketUpdate,
    article_create: articleCreate,
    attachment_upload: attachmentUpload
  };
}

export type EntitySchemas = ReturnType<typeof buildEntitySchemas>;
