#!/usr/bin/env node

import { isConfigurationError } from "../core/index.js";
import { runCli } from "./cli.js";

const EXIT_GENERAL_ERROR = 1;
const EXIT_CONFIG_ERROR = 2;

runCli().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(message);
  process.exitCode = isConfigurationError(error) ? EXIT_CONFIG_ERROR : EXIT_GENERAL_ERROR;
});
