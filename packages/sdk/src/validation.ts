/**
 * Validation utilities for store arguments
 */

import { ValidationError } from "./errors.js";

/**
 * Validate a restart index
 * @throws ValidationError unless n is a non-negative safe integer
 */
export function validateRestartIndex(n: number): number {
  if (typeof n !== "number" || !Number.isSafeInteger(n) || n < 0) {
    throw new ValidationError(`Restart index must be a non-negative integer, got ${String(n)}`);
  }
  return n;
}

/**
 * Validate a file-name component (display name or file extension)
 * @param value - Value to validate
 * @param label - Label for error messages
 * @throws ValidationError if the value cannot be used inside a single file name
 */
export function validateFileComponent(value: string, label: "name" | "filetype"): string {
  if (!value || typeof value !== "string") {
    throw new ValidationError(`${label} must be a non-empty string`);
  }

  if (value.includes("/") || value.includes("\\")) {
    throw new ValidationError(`${label} cannot contain slashes: "${value}"`);
  }

  if (value === "." || value === "..") {
    throw new ValidationError(`${label} cannot be "." or ".."`);
  }

  if (value.includes("\0")) {
    throw new ValidationError(`${label} cannot contain null bytes`);
  }

  return value;
}

/**
 * Validate an executable path
 */
export function validateExecutable(value: string): string {
  if (!value || typeof value !== "string") {
    throw new ValidationError("executable must be a non-empty string");
  }
  return value;
}
