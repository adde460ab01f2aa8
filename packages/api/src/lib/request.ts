import type { Request } from 'express';
import { InvalidParameterError } from '@cadence/bot';

// ---------------------------------------------------------------------------
// Request body readers
//
// express.json() hands routes an untyped body. These helpers pull out one
// field at a time with the expected type, throwing InvalidParameterError
// (400) on anything else, so route handlers never touch `unknown` directly.
// ---------------------------------------------------------------------------

export type Body = Record<string, unknown>;

function isRecord(value: unknown): value is Body {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readBody(req: Request): Body {
  const body: unknown = req.body;
  if (body === undefined || body === null) return {};
  if (!isRecord(body)) {
    throw new InvalidParameterError('Request body must be a JSON object.');
  }
  return body;
}

export function optionalString(body: Body, key: string): string | undefined {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new InvalidParameterError(`"${key}" must be a string.`);
  }
  return value;
}

export function requireString(body: Body, key: string): string {
  const value = optionalString(body, key);
  if (value === undefined || value.trim() === '') {
    throw new InvalidParameterError(`"${key}" is required.`);
  }
  return value.trim();
}

export function optionalInteger(body: Body, key: string): number | undefined {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new InvalidParameterError(`"${key}" must be an integer.`);
  }
  return value;
}

export function requireInteger(body: Body, key: string): number {
  const value = optionalInteger(body, key);
  if (value === undefined) {
    throw new InvalidParameterError(`"${key}" is required.`);
  }
  return value;
}

export function optionalBoolean(body: Body, key: string): boolean | undefined {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') {
    throw new InvalidParameterError(`"${key}" must be true or false.`);
  }
  return value;
}

/**
 * Parse a non-negative integer path parameter such as a queue index.
 */
export function integerParam(req: Request, key: string): number {
  const raw = req.params[key];
  const value = Number(raw);
  if (raw === undefined || raw === '' || !Number.isInteger(value) || value < 0) {
    throw new InvalidParameterError(`"${key}" must be a non-negative integer (got "${raw}").`);
  }
  return value;
}
