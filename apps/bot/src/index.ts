import { errorMessage, loadConfig } from "@tradeloop/core";
import { TradeLoopApp } from "./app.js";

const app = new TradeLoopApp(loadConfig());

function shutdown(signal: string): void {
  app.logger.warn("STOP", "STOP SIGNAL RECEIVED", { signal });
  app.stop().catch((error: unknown) => {
    // eslint-disable-next-line no-console
    console.error(`Shutdown failed: ${errorMessage(error)}`);
    process.exitCode = 1;
  });
}

process.on("SIGINT", () => {
  shutdown("SIGINT");
});
process.on("SIGTERM", () => {
  shutdown("SIGTERM");
});

app.start().catch((error: unknown) => {
  app.logger.error("BOOT_FAIL", "ERROR STARTING TRADELOOP", { error: errorMessage(error) });
  process.exitCode = 1;
  shutdown("BOOT_FAIL");
});
