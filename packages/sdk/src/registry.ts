/**
 * Display-name registry
 *
 * Persists a bijection ContentKey → display name in the sidecar file
 * `simplesimdb.json` inside the managed directory.
 *
 * Invariants:
 * - A bound name never changes until its entry is forgotten
 * - No two keys share a name
 * - A name never equals another entry's content key
 * - The reserved name "simplesimdb" is never bound
 * - A failed register() leaves the sidecar untouched
 * - An empty registry has no sidecar file
 *
 * Read-modify-write without locking: concurrent writers can lose updates
 * unless the store's advisory lock is enabled.
 */

import { z } from "zod";
import type { ContentKey, Registry } from "./types.js";
import { canonicalize, safeParseJson } from "./format/canonical.js";
import { atomicWrite, fileExists, readTextFileIfExists, removeFile } from "./io.js";
import { inputFile, registryFile, OUTPUT_MARKER, REGISTRY_NAME } from "./paths.js";
import { NamingConflictError, RegistryReadError, ValidationError } from "./errors.js";
import { validateFileComponent } from "./validation.js";
import { isContentKey } from "./hash.js";
import { logger } from "./observability/logs.js";

const RegistrySchema = z.record(z.string(), z.string().min(1));

export class NameRegistry {
  readonly #directory: string;
  readonly #file: string;

  constructor(directory: string) {
    this.#directory = directory;
    this.#file = registryFile(directory);
  }

  /**
   * Path of the sidecar file
   */
  get file(): string {
    return this.#file;
  }

  /**
   * Load the full registry (empty when the sidecar is absent)
   * @throws RegistryReadError if the sidecar is not a string → string object
   */
  async read(): Promise<Registry> {
    const raw = await readTextFileIfExists(this.#file);
    if (raw === null) {
      return {};
    }

    const parsed = safeParseJson(raw);
    if (!parsed.success) {
      throw new RegistryReadError(this.#file, { cause: new SyntaxError(parsed.error) });
    }

    const result = RegistrySchema.safeParse(parsed.data);
    if (!result.success) {
      throw new RegistryReadError(this.#file, { cause: result.error });
    }
    return result.data;
  }

  /**
   * Replace the whole registry; an empty map deletes the sidecar
   *
   * Use with care: this bypasses every naming check.
   */
  async write(registry: Registry): Promise<void> {
    if (Object.keys(registry).length === 0) {
      await removeFile(this.#file);
      return;
    }
    await atomicWrite(this.#file, canonicalize(registry, { indent: 4 }) + "\n");
  }

  /**
   * Display name for a key (the key itself when unregistered)
   */
  async resolve(key: ContentKey): Promise<string> {
    const registry = await this.read();
    return registry[key] ?? key;
  }

  /**
   * Bind a display name to a key
   * @throws ValidationError if the name cannot be a file stem
   * @throws NamingConflictError if the binding would break an invariant
   */
  async register(key: ContentKey, name: string): Promise<void> {
    validateFileComponent(name, "name");
    if (name.endsWith(OUTPUT_MARKER)) {
      throw new ValidationError(`name cannot end with "${OUTPUT_MARKER}": "${name}"`);
    }

    if (name === REGISTRY_NAME) {
      throw new NamingConflictError(
        "reserved",
        name,
        `The name '${name}' is reserved. Choose a different name!`
      );
    }

    // Unnamed entries live under their key; that stem belongs to them
    if (isContentKey(name) && name !== key) {
      throw new NamingConflictError(
        "name-taken",
        name,
        `The name '${name}' is the key of a different simulation. Choose a different name!`
      );
    }

    const registry = await this.read();
    const current = registry[key];

    if (current !== undefined) {
      if (current !== name) {
        throw new NamingConflictError(
          "key-bound",
          name,
          `The name '${name}' cannot be used! The input is already known under the name '${current}'. ` +
            `Delete the entry to clear its name.`
        );
      }
      // Same binding again
      return;
    }

    const unnamedInput = inputFile(this.#directory, key);
    if (await fileExists(unnamedInput)) {
      throw new NamingConflictError(
        "orphan",
        name,
        `The name '${name}' cannot be used! The input is already stored as '${unnamedInput}'. ` +
          `Delete the entry to rename it.`
      );
    }

    for (const [otherKey, otherName] of Object.entries(registry)) {
      if (otherName === name && otherKey !== key) {
        throw new NamingConflictError(
          "name-taken",
          name,
          `The name '${name}' is already in use for a different simulation. Choose a different name!`
        );
      }
    }

    await this.write({ ...registry, [key]: name });
    logger.debug("registry.register", { directory: this.#directory, key, message: name });
  }

  /**
   * Remove the binding of a key
   * @returns true if a binding was removed
   */
  async forget(key: ContentKey): Promise<boolean> {
    const registry = await this.read();
    if (!(key in registry)) {
      return false;
    }
    const { [key]: removed, ...rest } = registry;
    await this.write(rest);
    logger.debug("registry.forget", { directory: this.#directory, key, message: removed });
    return true;
  }

  /**
   * Remove every binding (and the sidecar)
   */
  async clear(): Promise<void> {
    await this.write({});
  }
}
