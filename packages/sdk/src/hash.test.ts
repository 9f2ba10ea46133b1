import { describe, it, expect } from "vitest";
import { hashCanonical, hashInput, hashStoredInput, isContentKey, serializeInput } from "./hash.js";
import { canonicalize, float } from "./format/canonical.js";

describe("hashInput", () => {
  it("should hash the compact canonical form with SHA-1", () => {
    expect(hashInput({ a: 1 })).toBe("e4ad4daad53a2eec0313386ada88211e50d693bd");
  });

  it("should hash escaped non-ASCII text", () => {
    expect(serializeInput({ name: "é", b: [1, 2.5] })).toBe(
      '{"b": [1, 2.5], "name": "\\u00e9"}'
    );
    expect(hashInput({ name: "é", b: [1, 2.5] })).toBe(
      "e352aaff9a24e499a93f50b35990d9e7269658da"
    );
  });

  it("should be deterministic", () => {
    const record = { nx: 64, dt: float(0.01), label: "run" };
    expect(hashInput(record)).toBe(hashInput(record));
  });

  it("should ignore key order", () => {
    expect(hashInput({ a: 1, b: { c: 2, d: 3 } })).toBe(hashInput({ b: { d: 3, c: 2 }, a: 1 }));
  });

  it("should tell integers and floats apart", () => {
    expect(hashInput({ a: 10 })).toBe("d1f6451b80dda3c0531f1a593fd4a12a8c05bd05");
    expect(hashInput({ a: float(10) })).toBe("23d18fe235b6998a89223800ff48c9ad1e887292");
  });

  it("should tell value types apart", () => {
    expect(hashInput({ a: "1" })).not.toBe(hashInput({ a: 1 }));
  });

  it("should produce content keys", () => {
    expect(isContentKey(hashInput({}))).toBe(true);
  });
});

describe("hashStoredInput", () => {
  it("should match hashInput for the stored indented form", () => {
    const record = { dt: float(0.5), n: 10, x: float(2), tags: ["a", "é"] };
    const stored = canonicalize(record, { indent: 4 }) + "\n";

    expect(hashStoredInput(stored)).toBe(hashInput(record));
  });

  it("should agree with hashCanonical on compact text", () => {
    expect(hashStoredInput('{"a": 1}')).toBe(hashCanonical('{"a": 1}'));
  });
});

describe("isContentKey", () => {
  it("should accept 40 lowercase hex characters only", () => {
    expect(isContentKey("e4ad4daad53a2eec0313386ada88211e50d693bd")).toBe(true);
    expect(isContentKey("E4AD4DAAD53A2EEC0313386ADA88211E50D693BD")).toBe(false);
    expect(isContentKey("e4ad4daa")).toBe(false);
    expect(isContentKey("my-run")).toBe(false);
  });
});
