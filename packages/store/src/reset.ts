import fs from "node:fs";
import path from "node:path";
import { appBaseDir, envSchema, loadDotenv, resolveModeScopedDbPath } from "@tradeloop/core";
import { Store } from "./db.js";

function removeIfExists(targetPath: string): void {
  if (!fs.existsSync(targetPath)) {
    return;
  }
  try {
    fs.rmSync(targetPath, { force: true });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`FAILED TO REMOVE DB FILE: ${targetPath} (${message}). STOP THE BOT AND RETRY.`);
  }
}

const baseDir = appBaseDir();
loadDotenv(baseDir);
const env = envSchema.pick({ MODE: true, MODE_SCOPED_DB: true, DB_PATH: true }).parse(process.env);
const resolved = resolveModeScopedDbPath(env.DB_PATH, env.MODE, env.MODE_SCOPED_DB);
if (resolved === ":memory:") {
  throw new Error("DB_PATH=:memory: has nothing to reset");
}

const dbPath = path.resolve(baseDir, resolved);
removeIfExists(dbPath);
removeIfExists(`${dbPath}-wal`);
removeIfExists(`${dbPath}-shm`);

const store = new Store(dbPath);
store.initialize();
store.close();

// eslint-disable-next-line no-console
console.log(`DB RESET COMPLETE: ${dbPath}`);
