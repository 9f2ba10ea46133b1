/**
 * Canonical JSON formatting for input records
 *
 * Provides deterministic, byte-stable serialization with:
 * - Keys sorted by code unit order at every level
 * - Non-ASCII characters escaped as lowercase \uXXXX
 * - Compact form (", " and ": " separators) for hashing
 * - Indented form for input files written to disk
 *
 * Invariants:
 * - Pure function: same input always produces same output bytes
 * - No mutation of input objects
 * - Anything that is not plain JSON data raises SerializationError
 */

import { SerializationError } from "../errors.js";

/**
 * A number that keeps float identity in the canonical form
 *
 * `10` serializes as `10`, `float(10)` as `10.0`, so the two hash differently.
 */
export class FloatValue {
  constructor(readonly value: number) {}

  toJSON(): number {
    return this.value;
  }
}

/**
 * Mark a number as a float for hashing purposes
 */
export function float(value: number): FloatValue {
  if (!Number.isFinite(value)) {
    throw new SerializationError("", `float() requires a finite number, got ${value}`);
  }
  return new FloatValue(value);
}

export interface CanonicalOptions {
  /** Spaces per level, or null for the single-line hashing form */
  indent: number | null;
}

const NON_ASCII = /[\u0080-\uffff]/g;

function escapeNonAscii(json: string): string {
  return json.replace(NON_ASCII, (ch) => "\\u" + ch.charCodeAt(0).toString(16).padStart(4, "0"));
}

/**
 * Deterministic comparison for object keys using code unit order
 */
function compareKeys(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function formatNumber(value: number, pointer: string): string {
  if (!Number.isFinite(value)) {
    throw new SerializationError(pointer, `${value} is not a finite number`);
  }
  return JSON.stringify(value);
}

function formatFloat(value: number, pointer: string): string {
  if (Object.is(value, -0)) {
    return "-0.0";
  }
  const text = formatNumber(value, pointer);
  return /^-?\d+$/.test(text) ? `${text}.0` : text;
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function escapePointer(key: string): string {
  return key.replace(/~/g, "~0").replace(/\//g, "~1");
}

/**
 * Canonicalize a value to stable, deterministic JSON text
 * @param input - Value to serialize (plain JSON data and FloatValue markers)
 * @param options - Indentation options
 * @returns Canonical JSON text without trailing newline
 * @throws SerializationError for values JSON cannot represent or circular references
 */
export function canonicalize(input: unknown, options: CanonicalOptions): string {
  const seen = new WeakSet<object>();
  const indent = options.indent;

  const write = (value: unknown, pointer: string, depth: number): string => {
    if (value === null) return "null";
    if (typeof value === "boolean") return value ? "true" : "false";
    if (typeof value === "number") return formatNumber(value, pointer);
    if (typeof value === "string") return escapeNonAscii(JSON.stringify(value));
    if (typeof value !== "object" || value === null) {
      throw new SerializationError(pointer, `values of type ${typeof value} are not allowed`);
    }

    if (value instanceof FloatValue) {
      return formatFloat(value.value, pointer);
    }

    // Detect cycles
    if (seen.has(value)) {
      throw new SerializationError(pointer, "circular reference detected");
    }
    seen.add(value);

    try {
      let items: string[];
      let open: string;
      let close: string;

      if (Array.isArray(value)) {
        items = value.map((item, i) => write(item, `${pointer}/${i}`, depth + 1));
        open = "[";
        close = "]";
      } else if (isPlainObject(value)) {
        const entries: [string, unknown][] = Object.entries(value);
        items = entries
          .sort(([a], [b]) => compareKeys(a, b))
          .map(([key, child]) => {
            const text = write(child, `${pointer}/${escapePointer(key)}`, depth + 1);
            return `${escapeNonAscii(JSON.stringify(key))}: ${text}`;
          });
        open = "{";
        close = "}";
      } else {
        const ctor = value.constructor.name || "anonymous class";
        throw new SerializationError(pointer, `instances of ${ctor} are not allowed`);
      }

      if (items.length === 0) {
        return open + close;
      }
      if (indent === null) {
        return open + items.join(", ") + close;
      }
      const inner = "\n" + " ".repeat(indent * (depth + 1));
      const outer = "\n" + " ".repeat(indent * depth);
      return open + inner + items.join("," + inner) + outer + close;
    } finally {
      seen.delete(value);
    }
  };

  return write(input, "", 0);
}

/**
 * Rewrite canonical JSON text (any indentation) into the compact hashing form
 *
 * Number lexemes are kept verbatim, so a stored `10.0` keeps its float identity,
 * which a JSON.parse round trip would lose. Raw non-ASCII characters are escaped.
 * The text must already be valid JSON with sorted keys.
 */
export function compactCanonicalText(text: string): string {
  let out = "";
  let inString = false;
  let escaped = false;

  for (const ch of text) {
    if (inString) {
      out += ch;
      if (escaped) {
        escaped = false;
      } else if (ch === "\\") {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    switch (ch) {
      case " ":
      case "\t":
      case "\n":
      case "\r":
      case "\ufeff":
        break;
      case ",":
        out += ", ";
        break;
      case ":":
        out += ": ";
        break;
      case '"':
        inString = true;
        out += ch;
        break;
      default:
        out += ch;
    }
  }

  return escapeNonAscii(out);
}

/**
 * Safe JSON parsing with structured error information
 * @param raw - Raw string to parse
 * @returns Parsed value or error details
 */
export function safeParseJson(
  raw: string
): { success: true; data: unknown } | { success: false; error: string } {
  try {
    const data: unknown = JSON.parse(raw);
    return { success: true, data };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { success: false, error: message };
  }
}
