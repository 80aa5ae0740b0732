import path from "node:path";
import { appBaseDir, envSchema, loadDotenv, resolveModeScopedDbPath } from "@tradeloop/core";
import { Store } from "./db.js";

const baseDir = appBaseDir();
loadDotenv(baseDir);
const env = envSchema.pick({ MODE: true, MODE_SCOPED_DB: true, DB_PATH: true }).parse(process.env);
const dbPath = path.resolve(baseDir, resolveModeScopedDbPath(env.DB_PATH, env.MODE, env.MODE_SCOPED_DB));
const store = new Store(dbPath);
store.initialize();

const summary = store.getTradeSummary();
const spentSol = Number(summary.baseSpentRaw) / 1_000_000_000;
const receivedSol = Number(summary.baseReceivedRaw) / 1_000_000_000;
const trades = store.getRecentTrades(8);
const runtime = store.getRuntimeState("engine");
store.close();

// eslint-disable-next-line no-console
console.log("===== PERFORMANCE SNAPSHOT =====");
// eslint-disable-next-line no-console
console.log(`DB: ${dbPath}`);
// eslint-disable-next-line no-console
console.log(`BUYS: ${summary.buys} SELLS: ${summary.sells} FAILED: ${summary.failed}`);
// eslint-disable-next-line no-console
console.log(`SPENT_SOL: ${spentSol.toFixed(6)} RECEIVED_SOL: ${receivedSol.toFixed(6)} NET_SOL: ${(receivedSol - spentSol).toFixed(6)}`);
if (runtime) {
  // eslint-disable-next-line no-console
  console.log(`ENGINE STATE @ ${runtime.updatedTs}: ${JSON.stringify(runtime.value)}`);
}
// eslint-disable-next-line no-console
console.log("----- RECENT TRADES -----");
for (const trade of trades) {
  // eslint-disable-next-line no-console
  console.log(
    `${trade.ts} ${trade.side} ${trade.symbol} IN=${trade.inAmount} OUT=${trade.outAmount ?? "n/a"} ${trade.status}${
      trade.reason ? ` (${trade.reason})` : ""
    }`,
  );
}
