import { hasExitCode } from "./carrier";
import { findInChain } from "./chain";
import { ExitCode } from "./codes";
import { isHelpRequested } from "./help";

export type HandlerResult = {
  code: number;
  handled: boolean;
};

/**
 * Custom exit-code policy. Return `handled: true` to decide the code;
 * otherwise the builtin rules apply.
 */
export type ErrorHandler = (err: unknown) => HandlerResult;

export type ExitFunction = (code: number) => never;

export type ExitCodeResolverOptions = {
  handler?: ErrorHandler;
  exit?: ExitFunction;
  logger?: { debug(message: string): void };
};

export type ExitCodeResolver = {
  /**
   * Pick an exit code for `err`:
   *
   * 1. no error: 0, without asking the handler
   * 2. the handler's code, when it reports `handled`
   * 3. 2 when help was requested anywhere in the chain
   * 4. the `exitCode` of the first link that carries one
   * 5. 1 otherwise
   */
  resolve(err: unknown): number;
  /** Exit the process with `resolve(err)`. */
  terminate(err: unknown): never;
};

const exitProcess: ExitFunction = (code) => process.exit(code);

export function createExitCodeResolver(
  options: ExitCodeResolverOptions = {},
): ExitCodeResolver {
  const { handler, logger } = options;
  const exit = options.exit ?? exitProcess;

  const decide = (rule: string, code: number): number => {
    logger?.debug(`exit code ${code} (${rule})`);
    return code;
  };

  const resolve = (err: unknown): number => {
    if (err === null || err === undefined) return ExitCode.success;

    if (handler) {
      const { code, handled } = handler(err);
      if (handled) return decide("custom handler", code);
    }

    if (isHelpRequested(err)) return decide("help requested", ExitCode.help);

    const coder = findInChain(err, hasExitCode);
    if (coder) return decide(coder.name, coder.exitCode);

    return decide("generic error", ExitCode.failure);
  };

  return {
    resolve,
    terminate: (err) => exit(resolve(err)),
  };
}

// Process-wide handler slot. Set it once at startup, before anything resolves
// concurrently; nothing here synchronizes access.
let errorHandler: ErrorHandler | undefined;

export function setErrorHandler(handler: ErrorHandler | undefined): void {
  errorHandler = handler;
}

export function resolveExitCode(err: unknown): number {
  return createExitCodeResolver({ handler: errorHandler }).resolve(err);
}

export function terminate(err: unknown): never {
  return exitProcess(resolveExitCode(err));
}
