/**
 * Persistence store contract and the two bundled stores.
 *
 * A store is a key-addressed bag of JSON values with read-your-own-write
 * semantics per key. Keys are namespaced by prefix:
 *
 *   session:<sessionId>   the SessionRecord
 *   archive:<sessionId>   the ArchiveEntry derived from it
 *   owner:<ownerRef>      the owner's session index, newest first
 *
 * Failures of the medium (disk, network) are reported as
 * StoreUnavailableError so callers can retry; a missing key is not a
 * failure and reads as undefined.
 */

import { mkdir, readFile, readdir, rm, writeFile, rename } from "node:fs/promises";
import { join } from "node:path";
import { StoreUnavailableError } from "../errors.js";

export interface PersistenceStore {
  /** Stored value, or undefined when the key is absent */
  read(key: string): Promise<unknown>;
  write(key: string, value: unknown): Promise<void>;
  /** Deleting an absent key is not an error */
  delete(key: string): Promise<void>;
  /** Keys starting with the prefix, sorted */
  keys(prefix: string): Promise<string[]>;
}

// ============================================================
// In-memory store
// ============================================================

/**
 * Keeps JSON copies of every value, so callers can neither mutate stored
 * state through a reference nor store something JSON cannot represent.
 */
export class MemoryPersistenceStore implements PersistenceStore {
  private readonly values = new Map<string, string>();

  async read(key: string): Promise<unknown> {
    const json = this.values.get(key);
    return json === undefined ? undefined : JSON.parse(json);
  }

  async write(key: string, value: unknown): Promise<void> {
    this.values.set(key, JSON.stringify(value));
  }

  async delete(key: string): Promise<void> {
    this.values.delete(key);
  }

  async keys(prefix: string): Promise<string[]> {
    return [...this.values.keys()].filter((k) => k.startsWith(prefix)).sort();
  }
}

// ============================================================
// JSON file store
// ============================================================

/**
 * One pretty-printed JSON file per key under a directory.
 * Keys are encoded into filenames, so any string is a valid key.
 */
export class FilePersistenceStore implements PersistenceStore {
  constructor(private readonly directory: string) {}

  async read(key: string): Promise<unknown> {
    let json: string;
    try {
      json = await readFile(this.pathFor(key), "utf-8");
    } catch (err) {
      if (isNotFound(err)) {
        return undefined;
      }
      throw new StoreUnavailableError(key, { cause: err });
    }
    try {
      return JSON.parse(json);
    } catch (err) {
      throw new StoreUnavailableError(key, { cause: err });
    }
  }

  async write(key: string, value: unknown): Promise<void> {
    const target = this.pathFor(key);
    const temp = `${target}.tmp`;
    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(temp, JSON.stringify(value, null, 2), "utf-8");
      await rename(temp, target);
    } catch (err) {
      throw new StoreUnavailableError(key, { cause: err });
    }
  }

  async delete(key: string): Promise<void> {
    try {
      await rm(this.pathFor(key), { force: true });
    } catch (err) {
      throw new StoreUnavailableError(key, { cause: err });
    }
  }

  async keys(prefix: string): Promise<string[]> {
    let names: string[];
    try {
      names = await readdir(this.directory);
    } catch (err) {
      if (isNotFound(err)) {
        return [];
      }
      throw new StoreUnavailableError(prefix, { cause: err });
    }
    return names
      .filter((name) => name.endsWith(".json"))
      .map((name) => decodeURIComponent(name.slice(0, -".json".length)))
      .filter((key) => key.startsWith(prefix))
      .sort();
  }

  private pathFor(key: string): string {
    return join(this.directory, `${encodeURIComponent(key)}.json`);
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
