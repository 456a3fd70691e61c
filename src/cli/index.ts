#!/usr/bin/env node

/**
 * infragen CLI Entry Point
 */

import { Command } from "commander";
import { VERSION } from "../version.js";
import { registerInitCommand } from "./commands/init.js";
import { registerGenerateCommand } from "./commands/generate.js";
import { registerValidateCommand } from "./commands/validate.js";
import { registerListCommand } from "./commands/list.js";
import { formatError } from "../utils/errors.js";

const program = new Command();

program
  .name("infragen")
  .description("Generate Docker Compose, Ansible and Terraform files from one project definition")
  .version(VERSION, "-v, --version", "Output the current version");

// Register commands
registerInitCommand(program);
registerGenerateCommand(program);
registerValidateCommand(program);
registerListCommand(program);

async function main(): Promise<void> {
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(formatError(error));
  process.exit(1);
});
