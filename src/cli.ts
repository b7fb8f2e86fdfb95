#!/usr/bin/env node

import { Command } from "commander";
import { list } from "./commands/list";
import { add } from "./commands/add";
import { edit } from "./commands/edit";
import { backup } from "./commands/backup";
import { describeError } from "./lib/errors";
import { DEFAULT_BACKUP_FILE } from "./lib/backup";
import { VERSION } from "./lib/version";

// Print the error chain and exit non-zero instead of dumping a stack trace
function run<A extends unknown[]>(action: (...args: A) => Promise<void>) {
  return async (...args: A): Promise<void> => {
    try {
      await action(...args);
    } catch (error) {
      console.error(`error: ${describeError(error)}`);
      process.exitCode = 1;
    }
  };
}

const program = new Command();

program
  .name("beeline")
  .description(
    `Command-line client for Beeminder

Set BEEMINDER_API_KEY to your personal auth token.
\`beeline edit\` opens $VISUAL or $EDITOR (default: vi).`
  )
  .version(VERSION);

program
  .command("list")
  .description("List all goals")
  .action(run(() => list()));

program
  .command("add")
  .description("Add a datapoint")
  .argument("<goal>", "The name of the goal")
  .argument("<value>", "The value of the datapoint")
  .argument("[comment]", "An optional comment for the datapoint")
  .action(run((goal: string, value: string, comment: string | undefined) => add(goal, value, comment)));

program
  .command("edit")
  .description("Edit recent datapoints for a goal")
  .argument("<goal>", "The name of the goal")
  .action(run((goal: string) => edit(goal)));

program
  .command("backup")
  .description("Backup all user data to JSON file")
  .argument("[filename]", "Output file name", DEFAULT_BACKUP_FILE)
  .action(run((filename: string) => backup(filename)));

program.parseAsync().catch((error: unknown) => {
  console.error(`error: ${describeError(error)}`);
  process.exitCode = 1;
});
