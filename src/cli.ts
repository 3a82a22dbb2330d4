#!/usr/bin/env node

// CLI entry point for simlookup
import { CLIRunner } from "./cli/cli-runner";

async function main() {
  const cli = new CLIRunner();
  await cli.run();
}

main().catch((error) => {
  console.error("CLI Error:", error);
  process.exit(1);
});
