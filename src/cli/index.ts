#!/usr/bin/env node
import "dotenv/config";

import { ConfigError, ConnectionError, errorMessage } from "../core/errors.js";
import { createStderrFormatter, createStdoutFormatter } from "../ui/fmt.js";
import { parseArgs, resolveCommand } from "./args.js";
import { runAgent, runRelay } from "./commands.js";
import { formatHelp } from "./help.js";

const requireApiKey = (): void => {
  if (process.env.OPENROUTER_API_KEY) {
    return;
  }
  const err = createStderrFormatter();
  console.error(
    err.errorBlock(
      "Missing OPENROUTER_API_KEY.",
      "Set it via environment or a .env file (dotenv is loaded), e.g. export OPENROUTER_API_KEY=..."
    )
  );
  process.exit(1);
};

const main = async (): Promise<void> => {
  const { command, rest } = resolveCommand(process.argv.slice(2));
  const out = createStdoutFormatter();

  if (command === "help") {
    console.log(formatHelp(out));
    return;
  }
  if (command === null) {
    console.error(formatHelp(createStderrFormatter()));
    process.exit(1);
  }

  const parsed = parseArgs(rest);
  try {
    requireApiKey();
    if (command === "relay") {
      await runRelay(parsed);
    } else {
      await runAgent(parsed);
    }
    process.exit(0);
  } catch (error) {
    const err = createStderrFormatter();
    if (error instanceof ConnectionError) {
      const hint = error.closeCode === undefined ? "Is the relay running? Start it with: parley relay" : undefined;
      console.error(err.errorBlock(error.message, hint));
    } else if (error instanceof ConfigError) {
      console.error(err.errorBlock(`Invalid configuration:\n${error.message}`));
    } else {
      console.error(err.errorBlock(errorMessage(error)));
    }
    process.exit(1);
  }
};

void main();
