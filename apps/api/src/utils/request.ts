// src/utils/request.ts

import { ValidationError } from "./errors.js";

export type Fields = Record<string, unknown>;

function isRecord(value: unknown): value is Fields {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function asFields(value: unknown, what = "Request body"): Fields {
  if (!isRecord(value)) {
    throw new ValidationError(`${what} must be an object`, {
      code: "INVALID_REQUEST_BODY",
    });
  }
  return value;
}

export function optionalString(fields: Fields, name: string): string | undefined {
  const value = fields[name];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new ValidationError(`${name} must be a string`);
  }
  return value;
}

export function requireString(fields: Fields, name: string): string {
  const value = optionalString(fields, name);
  if (!value) {
    throw new ValidationError(`Missing '${name}' parameter`);
  }
  return value;
}

/**
 * Accepts JSON numbers and the decimal strings query strings and multipart
 * fields carry.
 */
export function requireNonNegativeInt(fields: Fields, name: string): number {
  const value = fields[name];
  if (value === undefined || value === null || value === "") {
    throw new ValidationError(`Missing '${name}' parameter`);
  }

  const n = typeof value === "string" && /^\d+$/.test(value) ? Number(value) : value;
  if (typeof n !== "number" || !Number.isSafeInteger(n) || n < 0) {
    throw new ValidationError(`${name} must be a non-negative integer`);
  }
  return n;
}

export function optionalBoolean(fields: Fields, name: string, fallback: boolean): boolean {
  const value = fields[name];
  if (value === undefined || value === null || value === "") return fallback;
  if (typeof value === "boolean") return value;
  if (typeof value === "string") {
    const lowered = value.toLowerCase();
    if (lowered === "true" || lowered === "1") return true;
    if (lowered === "false" || lowered === "0") return false;
  }
  throw new ValidationError(`${name} must be a boolean`);
}

export function toBuffer(bytes: Uint8Array): Buffer {
  return Buffer.isBuffer(bytes)
    ? bytes
    : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}
