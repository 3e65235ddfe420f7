import { createUsersProgram } from "../users.ts";

await createUsersProgram().parseAsync(process.argv);
