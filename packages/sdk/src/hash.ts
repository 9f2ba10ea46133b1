/**
 * Content hashing: input record → ContentKey
 *
 * The key is the SHA-1 hex digest of the compact canonical form. Key order in the
 * record does not matter; value types and number spelling do (`10` vs `float(10)`).
 */

import { createHash } from "node:crypto";
import type { ContentKey, InputRecord } from "./types.js";
import { canonicalize, compactCanonicalText } from "./format/canonical.js";
import { SerializationError } from "./errors.js";

const CONTENT_KEY_PATTERN = /^[0-9a-f]{40}$/;

/**
 * SHA-1 hex digest of canonical JSON text
 */
export function hashCanonical(text: string): ContentKey {
  return createHash("sha1").update(text, "utf8").digest("hex");
}

/**
 * Compact canonical serialization used as hash input
 * @throws SerializationError if the record is not a JSON object of JSON values
 */
export function serializeInput(record: InputRecord): string {
  if (record === null || typeof record !== "object" || Array.isArray(record)) {
    throw new SerializationError("", "input record must be a JSON object");
  }
  return canonicalize(record, { indent: null });
}

/**
 * Hash an input record
 */
export function hashInput(record: InputRecord): ContentKey {
  return hashCanonical(serializeInput(record));
}

/**
 * Hash the text of a stored input file without a parse round trip
 */
export function hashStoredInput(text: string): ContentKey {
  return hashCanonical(compactCanonicalText(text));
}

/**
 * Check whether a string has the shape of a ContentKey
 */
export function isContentKey(value: string): boolean {
  return CONTENT_KEY_PATTERN.test(value);
}
