#!/usr/bin/env node

/**
 * forge entry point.
 *
 *   forge init --name demo
 *   forge build --release --features fast,small
 *   forge deploy --env staging --dry-run
 */

import { main } from "./main.js";

main(process.argv.slice(1))
  .then((exitCode) => process.exit(exitCode))
  .catch((err) => {
    console.error("Fatal error:", err);
    process.exit(1);
  });
