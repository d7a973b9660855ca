/**
 * @shipledger/engine — Entry point.
 *
 * Loads config, opens the file-backed log and runs one CLI command.
 */

import chalk from "chalk";
import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { runCommand } from "./cli.js";
import { ShipmentLifecycleService } from "./services/shipment-service.js";

function main(): void {
  const config = loadConfig();
  const logger = createLogger(config);

  try {
    const service = ShipmentLifecycleService.open(config, logger);
    process.exitCode = runCommand(service, process.argv.slice(2), {
      out: (line) => console.log(line),
      err: (line) => console.error(line),
      color: chalk,
    });
  } catch (err) {
    logger.fatal({ err }, "Command failed");
    process.exitCode = 1;
  }
}

try {
  main();
} catch (err: unknown) {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exitCode = 1;
}
