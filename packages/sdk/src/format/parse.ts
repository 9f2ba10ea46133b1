/**
 * Reading input records back from JSON text
 *
 * Number lexemes with a fraction or an exponent become FloatValue markers, so
 * `{"dt": 1.0}` typed on a command line hashes like `{ dt: float(1) }`.
 */

import { z } from "zod";
import type { InputRecord, JsonValue } from "../types.js";
import { FloatValue } from "./canonical.js";
import { SerializationError } from "../errors.js";

const FLOAT_KEY = "\u0000float";
const NUMBER = /-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?/y;

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number(),
    z.string(),
    // Before record: a FloatValue is an object too
    z.instanceof(FloatValue),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ])
);

const InputRecordSchema = z.record(z.string(), JsonValueSchema);

function stringEnd(text: string, start: number): number {
  let i = start + 1;
  while (i < text.length) {
    const ch = text.charAt(i);
    if (ch === "\\") {
      i += 2;
    } else if (ch === '"') {
      return i + 1;
    } else {
      i++;
    }
  }
  return text.length;
}

/**
 * Wrap float lexemes in marker objects that survive JSON.parse
 */
function markFloats(text: string): string {
  let out = "";
  let i = 0;

  while (i < text.length) {
    const ch = text.charAt(i);

    if (ch === '"') {
      const end = stringEnd(text, i);
      out += text.slice(i, end);
      i = end;
      continue;
    }

    if (ch === "-" || (ch >= "0" && ch <= "9")) {
      NUMBER.lastIndex = i;
      const match = NUMBER.exec(text);
      if (match) {
        const lexeme = match[0];
        out += /[.eE]/.test(lexeme) ? `{"\\u0000float": "${lexeme}"}` : lexeme;
        i += lexeme.length;
        continue;
      }
    }

    out += ch;
    i++;
  }

  return out;
}

function floatLexeme(value: unknown): string | undefined {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return undefined;
  }
  const entries: [string, unknown][] = Object.entries(value);
  if (entries.length !== 1) {
    return undefined;
  }
  const [[key, lexeme]] = entries;
  return key === FLOAT_KEY && typeof lexeme === "string" ? lexeme : undefined;
}

function revive(_key: string, value: unknown): unknown {
  const lexeme = floatLexeme(value);
  return lexeme === undefined ? value : new FloatValue(Number(lexeme));
}

/**
 * Parse JSON text into an input record, keeping float identity
 * @throws SerializationError if the text is not JSON or not an object
 */
export function parseInputRecord(text: string): InputRecord {
  const cleaned = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;

  let data: unknown;
  try {
    data = JSON.parse(markFloats(cleaned), revive);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new SerializationError("", `invalid JSON: ${reason}`, { cause: err });
  }

  // A bare float at the top level is a marker object, not a record
  const result = InputRecordSchema.safeParse(data instanceof FloatValue ? null : data);
  if (!result.success) {
    throw new SerializationError("", "input record must be a JSON object", { cause: result.error });
  }
  return result.data;
}
