/**
 * Process exit codes.
 *
 * The generic codes (0, 1, 2) are followed by the values of
 * `/usr/include/sysexits.h`, so shells and supervisors that understand the BSD
 * convention can tell failures apart.
 */
export const ExitCode = {
  success: 0,
  failure: 1,
  /** Help was requested (`-h`/`--help`) and printed instead of running. */
  help: 2,

  usage: 64,
  dataErr: 65,
  noInput: 66,
  noUser: 67,
  noHost: 68,
  unavailable: 69,
  software: 70,
  osErr: 71,
  osFile: 72,
  cantCreat: 73,
  ioErr: 74,
  tempFail: 75,
  protocol: 76,
  noPerm: 77,
  config: 78,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export type ExitCodeName = keyof typeof ExitCode;

const descriptions: Record<ExitCodeName, string> = {
  success: "success",
  failure: "generic error",
  help: "help requested",
  usage: "command line usage error",
  dataErr: "data format error",
  noInput: "cannot open input",
  noUser: "addressee unknown",
  noHost: "host name unknown",
  unavailable: "service unavailable",
  software: "internal software error",
  osErr: "system error (e.g., can't fork)",
  osFile: "critical OS file missing",
  cantCreat: "can't create (user) output file",
  ioErr: "input/output error",
  tempFail: "temp failure; user is invited to retry",
  protocol: "remote error in protocol",
  noPerm: "permission denied",
  config: "configuration error",
};

export type ExitCodeInfo = {
  name: ExitCodeName;
  code: ExitCode;
  description: string;
};

function isExitCodeName(value: string): value is ExitCodeName {
  return Object.hasOwn(ExitCode, value);
}

export function listExitCodes(): ExitCodeInfo[] {
  return Object.keys(ExitCode)
    .filter(isExitCodeName)
    .map((name) => ({ name, code: ExitCode[name], description: descriptions[name] }));
}

export function describeExitCode(code: number): ExitCodeInfo | undefined {
  return listExitCodes().find((info) => info.code === code);
}

/**
 * Parse a decimal exit status (0..255) or a constant name such as `ioErr`.
 * Names are matched case-insensitively.
 */
export function parseExitCode(text: string): number | undefined {
  const trimmed = text.trim();
  if (/^\d+$/.test(trimmed)) {
    const n = Number(trimmed);
    return n <= 255 ? n : undefined;
  }
  const lower = trimmed.toLowerCase();
  return listExitCodes().find((info) => info.name.toLowerCase() === lower)?.code;
}
