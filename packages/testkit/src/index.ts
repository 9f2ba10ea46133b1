/**
 * Test helpers for simdb packages
 */

export { createTempRoot, removeDir } from "./fs.js";
export { writeStubExecutable, readCallLog, shellQuote } from "./stub.js";
export type { StubOptions, StubOutput } from "./stub.js";
