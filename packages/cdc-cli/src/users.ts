// cdc-users: print a credential line for a server's cdcusers file.

import { Command } from "commander";
import { credentialFileLine } from "@cdc-stream/core";
import { write } from "./output.ts";

export function createUsersProgram(deps: { stdout?: NodeJS.WritableStream } = {}): Command {
  const stdout = deps.stdout ?? process.stdout;

  return new Command("cdc-users")
    .description("CDC user manager")
    .argument("<USER>", "username")
    .argument("<PASSWORD>", "password")
    .addHelpText(
      "after",
      "\nAppend the output of this program to /var/cache/maxscale/<service name>/cdcusers",
    )
    .action(async (user: string, password: string) => {
      await write(stdout, `${credentialFileLine(user, password)}\n`);
    });
}
