#!/usr/bin/env node
import { ConfigError } from "./app/config.js";
import { createCli } from "./cli/commands.js";

async function main() {
  const cli = createCli();
  await cli.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(`telegram-mcp configuration error: ${error.message}`);
  } else {
    console.error("telegram-mcp fatal error:", error);
  }
  process.exit(1);
});
