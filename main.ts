#!/usr/bin/env -S node --import tsx
import { intro, log, outro } from "@clack/prompts";

import { type Command, COMMANDS } from "./scripts/command.ts";
import { logError } from "./scripts/types/errors.ts";

const VERSION = "0.1.0";

const runCommand = async (command: Command, args: string[]) => {
  const subName = command.subcommands?.find((cmd) => cmd.name === args[0]);
  if (subName) {
    await runCommand(subName, args.slice(1));
    return;
  }
  await command.handler(args);
};

const args = process.argv.slice(2);
const helpCommand = COMMANDS.find((cmd) => cmd.name === "help");

if (!args[0] || args[0] === "--help" || args[0] === "-h") {
  console.log(`hearth ${VERSION}\n`);
  await helpCommand?.handler([]);
} else {
  const commandName = args[0];
  const command = COMMANDS.find((cmd) => cmd.name === commandName);
  if (command) {
    intro(`hearth ${command.name}`);
    try {
      await runCommand(command, args.slice(1));
      outro("Done.");
    } catch (error) {
      logError(error, command.name);
      process.exitCode = 1;
    }
  } else {
    log.error(`Command "${commandName}" not found.`);
    process.exitCode = 1;
  }
}
