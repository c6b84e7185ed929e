import type { Command } from "commander";
import { listExitCodes } from "../../domain/exit/codes";
import type { CliIO } from "../io";

export function registerCodesCommand(program: Command, io: CliIO): void {
  program
    .command("codes")
    .description("List the named exit codes")
    .action(() => {
      for (const info of listExitCodes()) {
        io.writeOut(`${info.code}\t${info.name}\t${info.description}\n`);
      }
    });
}
