import { CHARACTER_LIMIT } from '../../constants.js';
import { isJsonObject, type JsonObject, type JsonValue } from '../../core/entities/Json.js';

/** Metadata attached to a structured payload whose item list was shortened */
export interface TruncationMeta {
  readonly truncated: true;
  readonly original_size: number;
  readonly original_count: number;
  readonly limit: number;
  readonly note: string;
}

// Originals beyond this ratio of the limit are re-serialized without indentation
const COMPACT_THRESHOLD = 1.2;

const NOTICE_PATTERN = /\n\n--- RESPONSE TRUNCATED ---\nOriginal size: \d+ characters\. Limit: (\d+) characters\.\nUse pagination \(page, per_page\) or narrower search filters to see the rest\.$/;

export function truncationNotice(originalSize: number, limit: number): string {
  return [
    '',
    '',
    '--- RESPONSE TRUNCATED ---',
    `Original size: ${originalSize} characters. Limit: ${limit} characters.`,
    'Use pagination (page, per_page) or narrower search filters to see the rest.'
  ].join('\n');
}

function truncationNote(shown: number, originalCount: number, limit: number): string {
  return `Showing ${shown} of ${originalCount} items to stay within ${limit} characters. ` +
    'Request the next page or use narrower filters for the rest.';
}

function parseObject(text: string): JsonObject | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return isJsonObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function previousMeta(payload: JsonObject): { originalSize: number; originalCount: number } | null {
  const meta = payload._meta;
  if (!isJsonObject(meta) || meta.truncated !== true) {
    return null;
  }
  const { original_size: originalSize, original_count: originalCount } = meta;
  if (typeof originalSize !== 'number' || typeof originalCount !== 'number') {
    return null;
  }
  return { originalSize, originalCount };
}

/**
 * Shrink the `items` list to the longest prefix that fits, then re-serialize.
 * Only the list and the sibling `_meta` key change, so the result always parses.
 */
function truncateStructured(payload: JsonObject, items: JsonValue[], renderedSize: number, limit: number): string {
  const { _meta: _previous, ...rest } = payload;
  const earlier = previousMeta(payload);
  const originalSize = earlier?.originalSize ?? renderedSize;
  const originalCount = earlier?.originalCount ?? items.length;
  const compact = originalSize > limit * COMPACT_THRESHOLD;

  const serialize = (shown: number): string => {
    const meta: TruncationMeta = {
      truncated: true,
      original_size: originalSize,
      original_count: originalCount,
      limit,
      note: truncationNote(shown, originalCount, limit)
    };
    const candidate = { ...rest, items: items.slice(0, shown), _meta: meta };
    return compact ? JSON.stringify(candidate) : JSON.stringify(candidate, null, 2);
  };

  // Largest prefix length whose serialization fits; zero when nothing fits
  let low = 0;
  let high = items.length;
  while (low < high) {
    const mid = Math.ceil((low + high) / 2);
    if (serialize(mid).length <= limit) {
      low = mid;
    } else {
      high = mid - 1;
    }
  }
  return serialize(low);
}

function truncateText(rendered: string, limit: number): string {
  const match = NOTICE_PATTERN.exec(rendered);
  if (match && Number(match[1]) === limit && match.index <= limit) {
    return rendered;
  }
  return rendered.slice(0, limit) + truncationNotice(rendered.length, limit);
}

/**
 * Enforce the response size ceiling.
 *
 * Structured payloads with an `items` list lose trailing items and gain a
 * `_meta` block; everything else is cut at `limit` and followed by a notice
 * that does not count against the limit. Idempotent, and a no-op at or
 * under the limit.
 */
export function truncateResponse(rendered: string, limit: number = CHARACTER_LIMIT): string {
  if (rendered.length <= limit) {
    return rendered;
  }

  const payload = parseObject(rendered);
  if (payload) {
    const items = payload.items;
    if (Array.isArray(items)) {
      return truncateStructured(payload, items, rendered.length, limit);
    }
  }

  return truncateText(rendered, limit);
}
