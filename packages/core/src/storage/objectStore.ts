import fs from "node:fs/promises";
import path from "node:path";
import { StorageError, errorMessage } from "../errors";
import { toPosixPath } from "../utils/path";

export interface ObjectStore {
  get(key: string): Promise<Uint8Array>;
  put(key: string, content: Uint8Array | string): Promise<void>;
  delete(key: string): Promise<void>;
  exists(key: string): Promise<boolean>;
}

function isErrno(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

export async function getJson<T>(store: ObjectStore, key: string, parse: (value: unknown) => T): Promise<T> {
  const content = await store.get(key);
  try {
    return parse(JSON.parse(Buffer.from(content).toString("utf8")));
  } catch (error) {
    throw new StorageError(key, `invalid JSON content: ${errorMessage(error)}`, { cause: error });
  }
}

export async function putJson(store: ObjectStore, key: string, value: unknown): Promise<void> {
  await store.put(key, `${JSON.stringify(value, null, 2)}\n`);
}

/** Object store over a local directory; keys are POSIX relative paths below the root. */
export class FsObjectStore implements ObjectStore {
  private readonly rootAbsolute: string;

  constructor(storageRoot: string) {
    this.rootAbsolute = path.resolve(storageRoot);
  }

  private resolveKey(key: string): string {
    const absolutePath = path.resolve(this.rootAbsolute, key);
    const relative = toPosixPath(path.relative(this.rootAbsolute, absolutePath));
    if (relative.length === 0 || relative.startsWith("..") || path.isAbsolute(relative)) {
      throw new StorageError(key, "key escapes the storage root");
    }
    return absolutePath;
  }

  async get(key: string): Promise<Uint8Array> {
    const filePath = this.resolveKey(key);
    try {
      return await fs.readFile(filePath);
    } catch (error) {
      throw new StorageError(
        key,
        isErrno(error, "ENOENT") ? "object does not exist" : errorMessage(error),
        { cause: error },
      );
    }
  }

  async put(key: string, content: Uint8Array | string): Promise<void> {
    const filePath = this.resolveKey(key);
    const tempPath = `${filePath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(tempPath, content);
      await fs.rename(tempPath, filePath);
    } catch (error) {
      throw new StorageError(key, errorMessage(error), { cause: error });
    }
  }

  async delete(key: string): Promise<void> {
    const filePath = this.resolveKey(key);
    try {
      await fs.rm(filePath, { force: true });
    } catch (error) {
      throw new StorageError(key, errorMessage(error), { cause: error });
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      await fs.access(this.resolveKey(key));
      return true;
    } catch {
      return false;
    }
  }
}

export class InMemoryObjectStore implements ObjectStore {
  private readonly objects = new Map<string, Uint8Array>();

  async get(key: string): Promise<Uint8Array> {
    const content = this.objects.get(key);
    if (!content) {
      throw new StorageError(key, "object does not exist");
    }
    return content;
  }

  async put(key: string, content: Uint8Array | string): Promise<void> {
    this.objects.set(key, typeof content === "string" ? Buffer.from(content, "utf8") : content);
  }

  async delete(key: string): Promise<void> {
    this.objects.delete(key);
  }

  async exists(key: string): Promise<boolean> {
    return this.objects.has(key);
  }

  keys(): string[] {
    return [...this.objects.keys()].sort();
  }
}
