import { CommanderError } from "commander";
import { findInChain } from "../domain/exit/chain";
import { ExitCode } from "../domain/exit/codes";
import {
  createExitCodeResolver,
  type ErrorHandler,
  type ExitFunction,
} from "../domain/exit/resolver";
import { processIO, type CliIO } from "./io";
import { createProgram } from "./program";

const usageErrorCodes: ReadonlySet<string> = new Set([
  "commander.conflictingOption",
  "commander.excessArguments",
  "commander.invalidArgument",
  "commander.missingArgument",
  "commander.missingMandatoryOptionValue",
  "commander.optionMissingArgument",
  "commander.unknownCommand",
  "commander.unknownOption",
]);

function isUsageError(link: unknown): boolean {
  return link instanceof CommanderError && usageErrorCodes.has(link.code);
}

/** Argument mistakes exit with EX_USAGE instead of commander's 1. */
export const usageErrorHandler: ErrorHandler = (err) =>
  findInChain(err, isUsageError) === undefined
    ? { code: ExitCode.failure, handled: false }
    : { code: ExitCode.usage, handled: true };

function describeFailure(error: unknown, debug: boolean): string {
  if (!(error instanceof Error)) return String(error);
  return debug ? (error.stack ?? error.message) : error.message;
}

export type MainDeps = {
  io?: CliIO;
  exit?: ExitFunction;
};

export async function main(argv: string[], deps: MainDeps = {}): Promise<never> {
  const io = deps.io ?? processIO;
  const resolver = createExitCodeResolver({ handler: usageErrorHandler, exit: deps.exit });

  let failure: unknown;
  try {
    await createProgram(io).parseAsync(argv);
  } catch (error) {
    failure = error;
    // commander has already printed its own messages.
    if (!(error instanceof CommanderError)) {
      io.writeErr(`${describeFailure(error, argv.includes("--debug"))}\n`);
    }
  }
  return resolver.terminate(failure);
}
