import { z } from 'zod';
import { ValidationError, type FieldIssue } from '../../infrastructure/errors/ValidationError.js';

/**
 * Error map producing field-scoped reasons that quote the offending value,
 * e.g. "must be ≤ 100, got 250".
 */
export const fieldErrorMap: z.ZodErrorMap = (issue, ctx) => {
  const data: unknown = ctx.data;

  switch (issue.code) {
    case z.ZodIssueCode.invalid_type:
      if (issue.received === 'undefined') {
        return { message: 'is required' };
      }
      if (issue.expected === 'integer') {
        return { message: `must be an integer, got ${preview(data)}` };
      }
      return { message: `expected ${issue.expected}, got ${issue.received}` };

    case z.ZodIssueCode.too_big: {
      const max = Number(issue.maximum);
      if (issue.type === 'string') {
        return { message: `must be at most ${max} characters, got ${lengthOf(data)}` };
      }
      if (issue.type === 'array') {
        return { message: `too many ${lastSegment(issue.path, 'items')} (${lengthOf(data)}), maximum is ${max}` };
      }
      return { message: `must be ${issue.inclusive ? '≤' : '<'} ${max}, got ${preview(data)}` };
    }

    case z.ZodIssueCode.too_small: {
      const min = Number(issue.minimum);
      if (issue.type === 'string') {
        return { message: min === 1 ? 'must not be empty' : `must be at least ${min} characters, got ${lengthOf(data)}` };
      }
      if (issue.type === 'array') {
        return { message: `must contain at least ${min} item(s)` };
      }
      return { message: `must be ${issue.inclusive ? '≥' : '>'} ${min}, got ${preview(data)}` };
    }

    case z.ZodIssueCode.invalid_enum_value:
      return { message: `must be one of ${issue.options.join(', ')}, got ${preview(data)}` };

    case z.ZodIssueCode.invalid_string:
      if (issue.validation === 'datetime') {
        return { message: `must be an ISO-8601 timestamp with offset (e.g. 2024-01-15T10:30:00Z), got ${preview(data)}` };
      }
      if (issue.validation === 'email') {
        return { message: `must be a valid email address, got ${preview(data)}` };
      }
      return { message: 'has an invalid format' };

    case z.ZodIssueCode.invalid_union:
      return { message: `has an unsupported type (${typeName(data)})` };

    default:
      return { message: ctx.defaultError };
  }
};

/**
 * Dotted path with `[i]` for list positions; the empty path names the input itself.
 */
export function formatFieldPath(path: ReadonlyArray<string | number>): string {
  let result = '';
  for (const segment of path) {
    if (typeof segment === 'number') {
      result += `[${segment}]`;
    } else {
      result += result === '' ? segment : `.${segment}`;
    }
  }
  return result === '' ? 'input' : result;
}

/**
 * Convert zod issues into field issues; unrecognized keys become one
 * "unexpected field" issue per key.
 */
export function toFieldIssues(error: z.ZodError): FieldIssue[] {
  const issues: FieldIssue[] = [];
  for (const issue of error.issues) {
    if (issue.code === z.ZodIssueCode.unrecognized_keys) {
      for (const key of issue.keys) {
        issues.push({ field: formatFieldPath([...issue.path, key]), reason: 'unexpected field' });
      }
    } else {
      issues.push({ field: formatFieldPath(issue.path), reason: issue.message });
    }
  }
  return issues;
}

/**
 * Parse with the field error map; failures become a ValidationError.
 */
export function parseFields<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.output<S> {
  const result = schema.safeParse(raw, { errorMap: fieldErrorMap });
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

export function toValidationError(error: z.ZodError): ValidationError {
  const [first, ...rest] = toFieldIssues(error);
  if (!first) {
    return ValidationError.forField('input', 'is invalid');
  }
  return new ValidationError([first, ...rest]);
}

function preview(value: unknown): string {
  if (typeof value === 'string') {
    return JSON.stringify(value.length > 40 ? `${value.slice(0, 40)}...` : value);
  }
  if (typeof value === 'number' || typeof value === 'boolean' || value === null) {
    return String(value);
  }
  return typeName(value);
}

function lengthOf(value: unknown): number | string {
  if (typeof value === 'string' || Array.isArray(value)) {
    return value.length;
  }
  return typeName(value);
}

function typeName(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  return Array.isArray(value) ? 'array' : typeof value;
}

function lastSegment(path: ReadonlyArray<string | number>, fallback: string): string {
  for (let i = path.length - 1; i >= 0; i--) {
    const segment = path[i];
    if (typeof segment === 'string') {
      return segment;
    }
  }
  return fallback;
}
