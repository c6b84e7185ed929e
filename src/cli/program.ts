import { Command } from "commander";
import { registerClassifyCommand } from "./commands/classify";
import { registerCodesCommand } from "./commands/codes";
import { registerExplainCommand } from "./commands/explain";
import { processIO, type CliIO } from "./io";

export function createProgram(io: CliIO = processIO): Command {
  const program = new Command();

  const version = process.env.npm_package_version ?? "0.1.0";
  program
    .name("exitcode")
    .description("Pick process exit codes for errors")
    .version(version)
    // Settings are inherited by the subcommands registered below.
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.writeOut(text),
      writeErr: (text) => io.writeErr(text),
    });

  registerCodesCommand(program, io);
  registerExplainCommand(program, io);
  registerClassifyCommand(program, io);

  return program;
}
