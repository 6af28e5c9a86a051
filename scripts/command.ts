import createCmd from "./commands/create.ts";
import helpCmd from "./commands/help.ts";
import identifyCmd from "./commands/identify.ts";
import installCmd from "./commands/install.ts";
import launchCmd from "./commands/launch.ts";
import serverCmd from "./commands/server.ts";
import versionsCmd from "./commands/versions.ts";

export interface Command {
  name: string;
  description: string;
  subcommands?: Command[];
  handler: (args: string[]) => Promise<void>;
}

export const COMMANDS: Command[] = [
  createCmd,
  installCmd,
  launchCmd,
  serverCmd,
  versionsCmd,
  identifyCmd,
  helpCmd,
];
