import { createClientProgram } from "../client.ts";

await createClientProgram().parseAsync(process.argv);
