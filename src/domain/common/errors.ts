import { ExitCode } from "../exit/codes";

export type ErrorKind = "config" | "validation" | "io" | "unknown";

const exitCodeByKind: Record<ErrorKind, number> = {
  config: ExitCode.config,
  validation: ExitCode.dataErr,
  io: ExitCode.ioErr,
  unknown: ExitCode.failure,
};

export class AppError extends Error {
  readonly kind: ErrorKind;
  readonly exitCode: number;
  override readonly cause?: unknown;

  constructor(kind: ErrorKind, message: string, cause?: unknown) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
    this.exitCode = exitCodeByKind[kind];
    this.cause = cause;
  }
}

export class ConfigError extends AppError {
  constructor(message: string, cause?: unknown) {
    super("config", message, cause);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, cause?: unknown) {
    super("validation", message, cause);
  }
}

export class IOError extends AppError {
  readonly path?: string;

  constructor(message: string, cause?: unknown, path?: string) {
    super("io", message, cause);
    this.path = path;
  }
}
