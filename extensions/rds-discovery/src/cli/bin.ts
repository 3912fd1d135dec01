#!/usr/bin/env node

import { Command } from "commander";
import { DiscoveryEngine } from "../discovery/engine.js";
import { formatErrorMessage } from "../errors.js";
import { registerRdsDiscoveryCli } from "./commands.js";

const program = new Command()
  .name("rds-discovery")
  .description("Read-only discovery of the resources tied to an Amazon RDS instance or cluster");

registerRdsDiscoveryCli({ program, engine: new DiscoveryEngine() });

try {
  await program.parseAsync(process.argv);
} catch (err) {
  console.error(`error: ${formatErrorMessage(err)}`);
  process.exitCode = 1;
}
