import { describe, it, expect } from "vitest";
import { canonicalize, compactCanonicalText, float, safeParseJson } from "./canonical.js";
import { SerializationError } from "../errors.js";

describe("canonicalize", () => {
  describe("compact form", () => {
    it("should sort keys and use spaced separators", () => {
      expect(canonicalize({ b: 1, a: [true, null, "x"] }, { indent: null })).toBe(
        '{"a": [true, null, "x"], "b": 1}'
      );
    });

    it("should sort nested object keys", () => {
      expect(canonicalize({ z: { y: 1, x: 2 }, a: 0 }, { indent: null })).toBe(
        '{"a": 0, "z": {"x": 2, "y": 1}}'
      );
    });

    it("should print empty containers without padding", () => {
      expect(canonicalize({ a: {}, b: [] }, { indent: null })).toBe('{"a": {}, "b": []}');
    });

    it("should escape non-ASCII characters in values and keys", () => {
      expect(canonicalize({ "ü": "é" }, { indent: null })).toBe(
        '{"\\u00fc": "\\u00e9"}'
      );
    });

    it("should escape characters outside the BMP as surrogate pairs", () => {
      expect(canonicalize({ s: "\u{1f600}" }, { indent: null })).toBe('{"s": "\\ud83d\\ude00"}');
    });
  });

  describe("indented form", () => {
    it("should indent nested containers", () => {
      expect(canonicalize({ b: { c: 1 }, a: [] }, { indent: 4 })).toBe(
        '{\n    "a": [],\n    "b": {\n        "c": 1\n    }\n}'
      );
    });

    it("should put array items on their own lines", () => {
      expect(canonicalize({ a: [1, 2] }, { indent: 2 })).toBe('{\n  "a": [\n    1,\n    2\n  ]\n}');
    });
  });

  describe("floats", () => {
    it("should keep a decimal point on integral floats", () => {
      expect(canonicalize({ a: float(10) }, { indent: null })).toBe('{"a": 10.0}');
    });

    it("should leave plain integers alone", () => {
      expect(canonicalize({ a: 10 }, { indent: null })).toBe('{"a": 10}');
    });

    it("should print fractional floats as numbers", () => {
      expect(canonicalize({ a: float(0.25) }, { indent: null })).toBe('{"a": 0.25}');
    });

    it("should keep the sign of negative zero", () => {
      expect(canonicalize({ a: float(-0) }, { indent: null })).toBe('{"a": -0.0}');
    });

    it("should reject non-finite floats", () => {
      expect(() => float(Number.NaN)).toThrow(SerializationError);
      expect(() => float(Number.POSITIVE_INFINITY)).toThrow(SerializationError);
    });
  });

  describe("errors", () => {
    it("should reject undefined values with a pointer", () => {
      try {
        canonicalize({ a: { b: undefined } }, { indent: null });
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(SerializationError);
        if (err instanceof SerializationError) {
          expect(err.pointer).toBe("/a/b");
          expect(err.code).toBe("E_SERIALIZE");
        }
      }
    });

    it("should reject non-finite numbers", () => {
      expect(() => canonicalize({ x: Number.NaN }, { indent: null })).toThrow(
        'Input is not JSON-representable at "/x": NaN is not a finite number'
      );
    });

    it("should reject class instances", () => {
      expect(() => canonicalize({ m: new Map() }, { indent: null })).toThrow(
        "instances of Map are not allowed"
      );
      expect(() => canonicalize({ d: new Date(0) }, { indent: null })).toThrow(SerializationError);
    });

    it("should reject circular references", () => {
      const looped: Record<string, unknown> = {};
      looped.self = looped;
      expect(() => canonicalize(looped, { indent: null })).toThrow("circular reference detected");
    });

    it("should allow the same object twice when not circular", () => {
      const shared = { k: 1 };
      expect(canonicalize({ a: shared, b: shared }, { indent: null })).toBe(
        '{"a": {"k": 1}, "b": {"k": 1}}'
      );
    });

    it("should escape pointer segments", () => {
      try {
        canonicalize({ "a/b": { "c~d": Symbol("s") } }, { indent: null });
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(SerializationError);
        if (err instanceof SerializationError) {
          expect(err.pointer).toBe("/a~1b/c~0d");
        }
      }
    });
  });
});

describe("compactCanonicalText", () => {
  it("should turn the indented form into the compact form", () => {
    const record = { b: { c: [1, float(2)] }, a: "text", e: {}, f: [] };
    const indented = canonicalize(record, { indent: 4 }) + "\n";

    expect(compactCanonicalText(indented)).toBe(canonicalize(record, { indent: null }));
  });

  it("should keep number lexemes verbatim", () => {
    expect(compactCanonicalText('{\n    "a": 10.0,\n    "b": 1e+21\n}\n')).toBe(
      '{"a": 10.0, "b": 1e+21}'
    );
  });

  it("should not touch separators inside strings", () => {
    expect(compactCanonicalText('{ "a" :  "x, y: z" }')).toBe('{"a": "x, y: z"}');
  });

  it("should handle escaped quotes inside strings", () => {
    expect(compactCanonicalText('{"a": "q\\" ,x"}')).toBe('{"a": "q\\" ,x"}');
  });

  it("should escape raw non-ASCII characters", () => {
    expect(compactCanonicalText('{"a": "é"}')).toBe('{"a": "\\u00e9"}');
  });

  it("should drop a byte order mark", () => {
    expect(compactCanonicalText('\ufeff{"a": 1}')).toBe('{"a": 1}');
  });
});

describe("safeParseJson", () => {
  it("should return parsed data", () => {
    expect(safeParseJson('{"a": 1}')).toEqual({ success: true, data: { a: 1 } });
  });

  it("should return an error for invalid JSON", () => {
    const result = safeParseJson("{oops");
    expect(result.success).toBe(false);
  });
});
