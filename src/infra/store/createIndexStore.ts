import { AppConfig } from "../../config/env.js";
import { IndexStore } from "../../domain/indexStore.js";
import { createPostgresDatabase, createPostgresPool } from "../db/postgres.js";
import { FileIndexStore } from "./fileIndexStore.js";
import { MemoryIndexStore } from "./memoryIndexStore.js";
import { PgIndexStore } from "./pgIndexStore.js";

export async function createIndexStore(
  config: Pick<AppConfig, "store" | "storageDir" | "databaseUrl" | "maxIndexBytes">,
): Promise<IndexStore> {
  let store: IndexStore;
  if (config.store === "memory") {
    store = new MemoryIndexStore();
  } else if (config.store === "file") {
    store = new FileIndexStore(config.storageDir, { maxIndexBytes: config.maxIndexBytes });
  } else {
    if (!config.databaseUrl) {
      throw new Error("DATABASE_URL is required when KB_STORE=postgres.");
    }
    const db = createPostgresDatabase(createPostgresPool(config.databaseUrl));
    store = new PgIndexStore(db, { maxIndexBytes: config.maxIndexBytes });
  }

  await store.initialize();
  return store;
}
