#!/usr/bin/env node
/**
 * Fleet orchestration CLI
 *
 * Usage:
 *   npx tsx bin/edgefleet.ts deploy <name> <domain> <port> [environment]
 *   npx tsx bin/edgefleet.ts remove <name>
 *   npx tsx bin/edgefleet.ts rotate-cert <domain> | --all
 *   npx tsx bin/edgefleet.ts status
 *   npx tsx bin/edgefleet.ts serve
 */

import { runCli } from "../src/cli/commands.js";

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
