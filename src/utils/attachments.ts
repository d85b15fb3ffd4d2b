import { MAX_FILENAME_LENGTH } from '../constants.js';

/** Zammad API attachment format: {filename, data, "mime-type"} */
export interface ZammadAttachmentPayload {
  filename: string;
  data: string;
  'mime-type': string;
}

/** MIME type mapping for common file extensions */
const MIME_TYPES: Readonly<Record<string, string>> = {
  // Images
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
  '.svg': 'image/svg+xml',

  // Documents
  '.pdf': 'application/pdf',
  '.doc': 'application/msword',
  '.docx': 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  '.xls': 'application/vnd.ms-excel',
  '.xlsx': 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',

  // Text
  '.txt': 'text/plain',
  '.log': 'text/plain',
  '.md': 'text/markdown',
  '.csv': 'text/csv',
  '.json': 'application/json',
  '.xml': 'application/xml',
  '.html': 'text/html',
  '.eml': 'message/rfc822',

  // Archives
  '.zip': 'application/zip',
  '.gz': 'application/gzip'
};

export const DEFAULT_MIME_TYPE = 'application/octet-stream';

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export const MIME_TYPE_PATTERN = /^[A-Za-z0-9][\w.+-]*\/[\w.+-]+$/;

/**
 * Reduce a caller-supplied filename to its base name.
 *
 * Null bytes are removed and every directory component (either separator)
 * is dropped. Returns null when nothing usable remains.
 */
export function sanitizeFilename(filename: string): string | null {
  const withoutNulls = filename.replace(/\0/g, '');
  const segments = withoutNulls.split(/[/\\]/);
  const base = (segments[segments.length - 1] ?? '').trim();

  if (base === '' || base === '.' || base === '..') {
    return null;
  }
  return base.slice(0, MAX_FILENAME_LENGTH);
}

/**
 * Strict base64 check (standard alphabet, correct padding, whitespace ignored)
 */
export function isValidBase64(data: string): boolean {
  const compact = data.replace(/\s+/g, '');
  return compact.length > 0 && compact.length % 4 === 0 && BASE64_PATTERN.test(compact);
}

/**
 * Get MIME type from file extension
 */
export function guessMimeType(filename: string): string {
  const dot = filename.lastIndexOf('.');
  if (dot <= 0) {
    return DEFAULT_MIME_TYPE;
  }
  return MIME_TYPES[filename.slice(dot).toLowerCase()] ?? DEFAULT_MIME_TYPE;
}

export function toApiAttachment(upload: { filename: string; data: string; mime_type: string }): ZammadAttachmentPayload {
  return {
    filename: upload.filename,
    data: upload.data.replace(/\s+/g, ''),
    'mime-type': upload.mime_type
  };
}
