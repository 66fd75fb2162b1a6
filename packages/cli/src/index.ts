#!/usr/bin/env tsx

import { Command } from "commander";
import chalk from "chalk";
import { VERSION } from "@meshgate/core";

import { serveCommand } from "./serve.js";

const program = new Command();

program
    .name("meshgate")
    .description("Bridge a mesh radio network to a REST API")
    .version(VERSION);

program.addCommand(serveCommand);

program.parseAsync(process.argv).catch((err: unknown) => {
    console.error(chalk.red(`\nFatal error: ${err instanceof Error ? err.message : String(err)}`));
    process.exit(1);
});
