import { z } from "zod";
import { parseExitCode } from "../../domain/exit/codes";

export const LogLevelSchema = z
  .enum(["silent", "error", "warn", "info", "debug"])
  .default("info");

/** An exit status (0..255) or a constant name such as `"ioErr"`. */
export const ExitCodeValueSchema = z.union([
  z.number().int().min(0).max(255),
  z.string().transform((value, ctx) => {
    const code = parseExitCode(value);
    if (code === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown exit code: ${value}` });
      return z.NEVER;
    }
    return code;
  }),
]);

export const RuleMatchSchema = z
  .object({
    /** Compared with `error.name` */
    name: z.string().min(1).optional(),
    /** Compared with the error's `code` property (`"ENOENT"`, `404`, ...) */
    code: z.union([z.string().min(1), z.number().int()]).optional(),
    /** Substring of the message */
    message: z.string().min(1).optional(),
    /** Regular expression tested against the message */
    pattern: z.string().min(1).optional(),
  })
  .refine(
    (m) => [m.name, m.code, m.message, m.pattern].some((v) => v !== undefined),
    { message: "A rule must match on at least one field" },
  );

export const RuleSchema = z.object({
  match: RuleMatchSchema,
  exitCode: ExitCodeValueSchema,
});

export const AppConfigSchema = z.object({
  logLevel: LogLevelSchema,
  rules: z.array(RuleSchema).default([]),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type Rule = z.infer<typeof RuleSchema>;
export type RuleMatch = z.infer<typeof RuleMatchSchema>;
