/**
 * request-validation.ts — Typed readers for JSON request bodies
 *
 * Route handlers receive `unknown` from req.json(). These readers narrow
 * one field at a time and throw RequestValidationError, which the route
 * maps to 400 { error }.
 */

export class RequestValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RequestValidationError";
  }
}

export type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function asObject(body: unknown): JsonObject {
  if (!isJsonObject(body)) {
    throw new RequestValidationError("Request body must be a JSON object");
  }
  return body;
}

/** Parse a request body; malformed JSON is a validation error. */
export async function readJsonBody(req: { json(): Promise<unknown> }): Promise<JsonObject> {
  let body: unknown;
  try {
    body = await req.json();
  } catch {
    throw new RequestValidationError("Request body is not valid JSON");
  }
  return asObject(body);
}

interface NumberRule {
  min?: number;
  max?: number;
  integer?: boolean;
}

function checkNumber(key: string, value: unknown, rule: NumberRule): number {
  const n = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  if (typeof n !== "number" || !Number.isFinite(n)) {
    throw new RequestValidationError(`"${key}" must be a number`);
  }
  if (rule.integer && !Number.isInteger(n)) {
    throw new RequestValidationError(`"${key}" must be an integer`);
  }
  if (rule.min !== undefined && n < rule.min) {
    throw new RequestValidationError(`"${key}" must be >= ${rule.min}`);
  }
  if (rule.max !== undefined && n > rule.max) {
    throw new RequestValidationError(`"${key}" must be <= ${rule.max}`);
  }
  return n;
}

export function requireNumber(body: JsonObject, key: string, rule: NumberRule = {}): number {
  if (body[key] === undefined || body[key] === null) {
    throw new RequestValidationError(`Missing required field: ${key}`);
  }
  return checkNumber(key, body[key], rule);
}

export function optionalNumber(body: JsonObject, key: string, fallback: number, rule: NumberRule = {}): number {
  if (body[key] === undefined || body[key] === null) return fallback;
  return checkNumber(key, body[key], rule);
}

export function requireString(body: JsonObject, key: string): string {
  const value = body[key];
  if (typeof value !== "string" || value.trim() === "") {
    throw new RequestValidationError(`Missing required field: ${key}`);
  }
  return value;
}

export function optionalString(body: JsonObject, key: string, fallback: string): string {
  const value = body[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== "string") {
    throw new RequestValidationError(`"${key}" must be a string`);
  }
  return value;
}

export function optionalBoolean(body: JsonObject, key: string, fallback: boolean): boolean {
  const value = body[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== "boolean") {
    throw new RequestValidationError(`"${key}" must be true or false`);
  }
  return value;
}

export function optionalEnum<T extends string>(body: JsonObject, key: string, allowed: readonly T[], fallback: T): T {
  const value = body[key];
  if (value === undefined || value === null) return fallback;
  const match = allowed.find(a => a === value);
  if (match === undefined) {
    throw new RequestValidationError(`Invalid ${key}. Valid: ${allowed.join(", ")}`);
  }
  return match;
}

export function optionalStringArray(body: JsonObject, key: string, fallback: string[]): string[] {
  const value = body[key];
  if (value === undefined || value === null) return fallback;
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === "string")) {
    throw new RequestValidationError(`"${key}" must be an array of strings`);
  }
  return value;
}

/** String → number map, e.g. { "FR": 0.05 } grid overrides or carbon factors. */
export function optionalNumberRecord(body: JsonObject, key: string): Record<string, number> {
  const value = body[key];
  if (value === undefined || value === null) return {};
  if (!isJsonObject(value)) {
    throw new RequestValidationError(`"${key}" must be an object of numbers`);
  }
  const out: Record<string, number> = {};
  for (const [k, v] of Object.entries(value)) {
    out[k] = checkNumber(`${key}.${k}`, v, { min: 0 });
  }
  return out;
}
