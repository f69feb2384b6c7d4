#!/usr/bin/env node
import { formatErrorMessage } from "./errors.js";
import { createSubsystemLogger } from "./logging.js";
import { startServer } from "./server.js";

const log = createSubsystemLogger("main");

startServer().then(
  () => process.exit(0),
  (error: unknown) => {
    log.error(formatErrorMessage(error));
    process.exit(1);
  }
);
