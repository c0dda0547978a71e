import { promises as fs } from "node:fs";
import path from "node:path";
import {
  IndexStorageInfo,
  IndexStore,
  KnowledgeBaseManifest,
  parseManifest,
} from "../../domain/indexStore.js";

export interface FileIndexStoreOptions {
  maxIndexBytes: number;
}

const KEY_PATTERN = /^[a-f0-9]{32}$/;

/**
 * Layout under `rootDir`:
 *   manifest.json         filename → key mapping and pending deletions
 *   indexes/<key>.json    serialized index snapshot
 *   sources/<key>.bin     raw document bytes
 */
export class FileIndexStore implements IndexStore {
  private initialized = false;

  private writeChain: Promise<void> = Promise.resolve();

  private readonly rootDir: string;

  constructor(
    rootDir: string,
    private readonly options: FileIndexStoreOptions,
  ) {
    this.rootDir = path.resolve(rootDir);
  }

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }
    await fs.mkdir(this.indexDir(), { recursive: true });
    await fs.mkdir(this.sourceDir(), { recursive: true });
    this.initialized = true;
  }

  async loadManifest(): Promise<KnowledgeBaseManifest | null> {
    await this.initialize();
    const raw = await readTextIfExists(this.manifestPath());
    if (raw === null) {
      return null;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new Error(`Knowledge base manifest at ${this.manifestPath()} is not valid JSON.`, {
        cause: error,
      });
    }
    return parseManifest(parsed);
  }

  async saveManifest(manifest: KnowledgeBaseManifest): Promise<void> {
    await this.initialize();
    const serialized = JSON.stringify(manifest, null, 2);
    await this.enqueueWrite(() => writeFileAtomically(this.manifestPath(), serialized));
  }

  async saveIndex(key: string, serialized: string, source: Buffer): Promise<void> {
    await this.initialize();
    assertKey(key);
    const bytes = Buffer.byteLength(serialized, "utf-8");
    if (bytes > this.options.maxIndexBytes) {
      throw new Error(`Index snapshot exceeds size limit (${bytes} > ${this.options.maxIndexBytes} bytes).`);
    }

    await this.enqueueWrite(async () => {
      await writeFileAtomically(this.sourcePath(key), source);
      await writeFileAtomically(this.indexPath(key), serialized);
    });
  }

  async loadIndex(key: string): Promise<string | null> {
    await this.initialize();
    assertKey(key);
    return readTextIfExists(this.indexPath(key));
  }

  async loadSource(key: string): Promise<Buffer | null> {
    await this.initialize();
    assertKey(key);
    try {
      return await fs.readFile(this.sourcePath(key));
    } catch (error) {
      if (isFileMissing(error)) {
        return null;
      }
      throw error;
    }
  }

  async deleteIndex(key: string): Promise<void> {
    await this.initialize();
    assertKey(key);
    await this.enqueueWrite(async () => {
      await fs.rm(this.indexPath(key), { force: true });
      await fs.rm(this.sourcePath(key), { force: true });
    });
  }

  async getStorageInfo(): Promise<IndexStorageInfo> {
    await this.initialize();
    const files = await fs.readdir(this.indexDir());
    let sizeBytes = 0;
    let indexCount = 0;
    for (const dir of [this.indexDir(), this.sourceDir()]) {
      for (const file of await fs.readdir(dir)) {
        const stat = await fs.stat(path.join(dir, file));
        sizeBytes += stat.size;
      }
    }
    for (const file of files) {
      if (file.endsWith(".json")) {
        indexCount += 1;
      }
    }
    return {
      kind: "file",
      location: this.rootDir,
      indexCount,
      sizeBytes,
      maxIndexBytes: this.options.maxIndexBytes,
    };
  }

  async close(): Promise<void> {
    await this.writeChain;
  }

  private enqueueWrite(task: () => Promise<void>): Promise<void> {
    const next = this.writeChain.then(task, task);
    // A failed write rejects its caller; later writes still run.
    this.writeChain = next.catch(() => undefined);
    return next;
  }

  private manifestPath(): string {
    return path.join(this.rootDir, "manifest.json");
  }

  private indexDir(): string {
    return path.join(this.rootDir, "indexes");
  }

  private sourceDir(): string {
    return path.join(this.rootDir, "sources");
  }

  private indexPath(key: string): string {
    return path.join(this.indexDir(), `${key}.json`);
  }

  private sourcePath(key: string): string {
    return path.join(this.sourceDir(), `${key}.bin`);
  }
}

function assertKey(key: string): void {
  if (!KEY_PATTERN.test(key)) {
    throw new Error(`Invalid document key: ${key}`);
  }
}

async function readTextIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (isFileMissing(error)) {
      return null;
    }
    throw error;
  }
}

async function writeFileAtomically(targetPath: string, content: string | Buffer): Promise<void> {
  const tempPath = `${targetPath}.tmp`;
  await fs.writeFile(tempPath, content);
  await replaceFileSafely(tempPath, targetPath, content);
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

function isFileMissing(error: unknown): boolean {
  return errorCode(error) === "ENOENT";
}

async function replaceFileSafely(
  tempPath: string,
  targetPath: string,
  content: string | Buffer,
): Promise<void> {
  try {
    await fs.rename(tempPath, targetPath);
    return;
  } catch (error) {
    if (!isReplaceableRenameError(error)) {
      throw error;
    }
  }

  try {
    await fs.rm(targetPath, { force: true });
    await fs.rename(tempPath, targetPath);
    return;
  } catch (error) {
    if (!isReplaceableRenameError(error)) {
      throw error;
    }
  }

  // Last fallback for Windows file-lock edge cases.
  await fs.writeFile(targetPath, content);
  await fs.rm(tempPath, { force: true });
}

function isReplaceableRenameError(error: unknown): boolean {
  const code = errorCode(error);
  return code === "EPERM" || code === "EEXIST" || code === "EBUSY";
}
