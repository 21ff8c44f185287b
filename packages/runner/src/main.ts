import "dotenv/config";
import { ConfigError, loadConfig } from "./config.js";
import type { RunnerConfig } from "./config.js";
import { formatSummary, runGame } from "./run-game.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", reason);
  process.exit(1);
});

process.on("uncaughtException", (err) => {
  console.error("Uncaught exception:", err);
  process.exit(1);
});

function readConfig(): RunnerConfig {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`Configuration error: ${err.message}`);
      process.exit(1);
    }
    throw err;
  }
}

async function main(): Promise<void> {
  const result = await runGame(readConfig());
  console.log(formatSummary(result));
}

main().catch((err: unknown) => {
  console.error("Run failed:", err instanceof Error ? err.message : String(err));
  process.exit(1);
});
