// src/utils/safePath.ts

import path from "path";

import { AccessDeniedError, ValidationError } from "./errors.js";

/**
 * Resolves a client-supplied relative path against `rootDir`. The result must
 * be the root itself or strictly inside it.
 */
export function resolveSafePath(rootDir: string, subPath: string): string {
  if (subPath.includes("\0")) {
    throw new ValidationError("Path contains a NUL byte");
  }

  const root = path.resolve(rootDir);
  const full = path.resolve(root, subPath);

  if (full !== root && !full.startsWith(root + path.sep)) {
    throw new AccessDeniedError();
  }

  return full;
}

export function assertSafeFilename(filename: string): string {
  if (
    filename.length === 0 ||
    filename.length > 255 ||
    filename === "." ||
    filename === ".." ||
    /[\\/\0]/.test(filename)
  ) {
    throw new ValidationError("filename must be a plain file name", {
      code: "INVALID_FILENAME",
    });
  }
  return filename;
}
