export * from "./domain/exit";
export {
  AppError,
  ConfigError,
  IOError,
  ValidationError,
  type ErrorKind,
} from "./domain/common/errors";
export { createRuleHandler } from "./application/policy/rule-handler";
export { loadConfig, type LoadConfigArgs } from "./infrastructure/config/load";
export {
  AppConfigSchema,
  RuleSchema,
  type AppConfig,
  type Rule,
  type RuleMatch,
} from "./infrastructure/config/schema";
export { createLogger, type Logger } from "./cli/logging";
