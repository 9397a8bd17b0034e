import { ValidationError } from '../middleware/error.middleware';

/**
 * Request bodies arrive as JSON or urlencoded form data and are untyped
 * until checked here.
 */
export type RequestBody = Record<string, unknown>;

export function asBody(body: unknown): RequestBody {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    return {};
  }
  const entries: RequestBody = {};
  for (const [key, value] of Object.entries(body)) {
    entries[key] = value;
  }
  return entries;
}

export function requireString(body: RequestBody, field: string): string {
  const value = body[field];
  if (typeof value !== 'string' || value === '') {
    throw new ValidationError(`Missing required field: ${field}`);
  }
  return value;
}

/**
 * Accepts real booleans from JSON and "true"/"false" from HTML forms
 */
export function optionalBoolean(body: RequestBody, field: string): boolean | undefined {
  const value = body[field];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value === 'boolean') {
    return value;
  }
  if (value === 'true' || value === 'false') {
    return value === 'true';
  }
  throw new ValidationError(`Field ${field} must be a boolean`);
}
