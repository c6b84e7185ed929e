export type CliIO = {
  writeOut(text: string): void;
  writeErr(text: string): void;
};

export const processIO: CliIO = {
  writeOut: (text) => process.stdout.write(text),
  writeErr: (text) => process.stderr.write(text),
};
