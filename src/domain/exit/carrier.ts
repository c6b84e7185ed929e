import { errorf } from "./errorf";

/**
 * An error that knows which exit code it should produce. Any error with an
 * integer `exitCode` qualifies: `ExitCodeError`, the application errors,
 * commander's `CommanderError`, execa's child-process failures.
 */
export interface ExitCoder extends Error {
  readonly exitCode: number;
}

/** An `exitCode` that cannot be read counts as no exit code. */
export function hasExitCode(value: unknown): value is ExitCoder {
  try {
    return value instanceof Error && "exitCode" in value && Number.isInteger(value.exitCode);
  } catch {
    return false;
  }
}

/**
 * Pins an exit code on another error. Message and name are the wrapped
 * error's; the original stays reachable through `cause`. Instances are
 * frozen. Only integer codes can be carried; anything else is a `RangeError`.
 */
export class ExitCodeError extends Error implements ExitCoder {
  readonly exitCode: number;
  override readonly cause: unknown;

  constructor(exitCode: number, cause: unknown) {
    if (!Number.isInteger(exitCode)) {
      throw new RangeError(`Exit code must be an integer, got ${exitCode}`);
    }
    super(cause instanceof Error ? cause.message : String(cause), { cause });
    this.name = cause instanceof Error ? cause.name : "ExitCodeError";
    this.exitCode = exitCode;
    this.cause = cause;
    Object.freeze(this);
  }
}

/**
 * Attach `code` to `err`. A missing error stays missing, so
 * `return withExitCode(74, await flush())` is safe on the success path.
 */
export function withExitCode(code: number, err: null | undefined): undefined;
export function withExitCode(code: number, err: Error): ExitCodeError;
export function withExitCode(code: number, err: unknown): ExitCodeError | undefined;
export function withExitCode(code: number, err: unknown): ExitCodeError | undefined {
  if (err === null || err === undefined) return undefined;
  return new ExitCodeError(code, err);
}

export function withExitCodef(code: number, template: string, ...args: unknown[]): ExitCodeError {
  return new ExitCodeError(code, errorf(template, ...args));
}

export type ErrorSlot = { error?: unknown };

/**
 * Rewrite `slot.error` with `code` attached, if it holds an error. Meant for a
 * `finally` block so that every exit path of a function is covered:
 *
 * ```ts
 * const slot: ErrorSlot = {};
 * try {
 *   slot.error = await save();
 * } finally {
 *   withExitCodeDeferred(ExitCode.cantCreat, slot);
 * }
 * ```
 */
export function withExitCodeDeferred(code: number, slot: ErrorSlot): void {
  if (slot.error === null || slot.error === undefined) return;
  slot.error = withExitCode(code, slot.error);
}

/**
 * Run `fn` and rethrow whatever it throws with `code` attached.
 */
export async function pinExitCode<T>(code: number, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    throw withExitCode(code, error) ?? error;
  }
}
