import type { Command } from "commander";
import { z } from "zod";
import { createRuleHandler } from "../../application/policy/rule-handler";
import { withExitCode, withExitCodef } from "../../domain/exit/carrier";
import { ExitCode, parseExitCode } from "../../domain/exit/codes";
import { createExitCodeResolver } from "../../domain/exit/resolver";
import { loadConfig } from "../../infrastructure/config/load";
import type { CliIO } from "../io";
import { createLogger } from "../logging";

const OptionsSchema = z.object({
  name: z.string().min(1).optional(),
  code: z.string().min(1).optional(),
  message: z.string().default("error"),
  pin: z.string().optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
  debug: z.boolean().optional(),
});

function sampleError(args: z.infer<typeof OptionsSchema>): Error {
  const error = new Error(args.message);
  if (args.name) error.name = args.name;
  if (args.code) {
    const code = /^-?\d+$/.test(args.code) ? Number(args.code) : args.code;
    Object.assign(error, { code });
  }
  return error;
}

export function registerClassifyCommand(program: Command, io: CliIO): void {
  program
    .command("classify")
    .description("Resolve the exit code a configured policy gives an error")
    .option("--name <name>", "Error name")
    .option("--code <code>", "Error code property (e.g. ENOENT)")
    .option("--message <text>", "Error message", "error")
    .option("--pin <code>", "Attach this exit code before resolving")
    .option("--config <path>", "Path to YAML/JSON config file")
    .option("--verbose", "Verbose logs")
    .option("--debug", "Debug logs (includes the deciding rule)")
    .action(async (opts: unknown) => {
      const parsed = OptionsSchema.safeParse(opts);
      if (!parsed.success) {
        throw withExitCodef(
          ExitCode.usage,
          "%s",
          parsed.error.issues.map((i) => i.message).join("\n"),
        );
      }
      const args = parsed.data;
      const logLevel = args.debug ? "debug" : args.verbose ? "info" : undefined;

      let pinned: number | undefined;
      if (args.pin !== undefined) {
        pinned = parseExitCode(args.pin);
        if (pinned === undefined) {
          throw withExitCodef(ExitCode.usage, "--pin: unknown exit code %s", args.pin);
        }
      }

      const config = await loadConfig({
        configPath: args.config,
        overrides: logLevel ? { logLevel } : undefined,
      });
      const logger = createLogger(config);
      logger.info(`Loaded ${config.rules.length} rule(s)`);

      const resolver = createExitCodeResolver({
        handler: createRuleHandler(config.rules),
        logger,
      });
      const error = sampleError(args);
      const subject = pinned === undefined ? error : withExitCode(pinned, error);
      io.writeOut(`${resolver.resolve(subject)}\n`);
    });
}
