// @cdc-stream/cli - command line programs

export {
  createClientProgram,
  runClient,
  ExitCode,
  type ClientCliOptions,
  type ClientDeps,
} from "./client.ts";
export { createUsersProgram } from "./users.ts";
