import type { Command } from "commander";
import { ValidationError } from "../../domain/common/errors";
import { describeExitCode, parseExitCode } from "../../domain/exit/codes";
import type { CliIO } from "../io";

export function registerExplainCommand(program: Command, io: CliIO): void {
  program
    .command("explain")
    .description("Describe an exit code")
    .argument("<code>", "Exit status or constant name (e.g. 74, ioErr)")
    .action((text: string) => {
      const code = parseExitCode(text);
      const info = code === undefined ? undefined : describeExitCode(code);
      if (!info) throw new ValidationError(`Unknown exit code: ${text}`);
      io.writeOut(`${info.code} ${info.name}: ${info.description}\n`);
    });
}
