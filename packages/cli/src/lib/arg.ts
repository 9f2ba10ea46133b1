/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import { parseInputRecord, SerializationError } from "@simdb/sdk";
import type { ErrorPolicy, InputRecord } from "@simdb/sdk";
import { CliError } from "./errors.js";

const ERROR_POLICIES: readonly ErrorPolicy[] = ["raise", "display", "ignore"];

/**
 * Parse a non-negative integer argument
 */
export function parseNonNegativeInt(value: string, name: string): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer`);
  }

  const parsed = Number.parseInt(trimmed, 10);

  if (!Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError(`${name} is too large`);
  }

  return parsed;
}

/**
 * Parse an --on-error value
 */
export function parseErrorPolicy(value: string): ErrorPolicy {
  const policy = ERROR_POLICIES.find((candidate) => candidate === value.trim());
  if (!policy) {
    throw new InvalidArgumentError(`must be one of ${ERROR_POLICIES.join(", ")}`);
  }
  return policy;
}

/**
 * Parse an input record with descriptive error messages
 */
export function parseRecord(value: string, source: string): InputRecord {
  try {
    return parseInputRecord(value);
  } catch (err) {
    if (err instanceof SerializationError) {
      throw new CliError(`Invalid input record in ${source}: ${err.message}`, { cause: err });
    }
    throw err;
  }
}
