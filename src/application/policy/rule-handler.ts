import { ValidationError } from "../../domain/common/errors";
import { walkErrorChain } from "../../domain/exit/chain";
import { ExitCode } from "../../domain/exit/codes";
import type { ErrorHandler } from "../../domain/exit/resolver";
import type { Rule, RuleMatch } from "../../infrastructure/config/schema";

type CompiledRule = {
  match: RuleMatch;
  pattern?: RegExp;
  exitCode: number;
};

function compile(rule: Rule, index: number): CompiledRule {
  if (rule.match.pattern === undefined) return { match: rule.match, exitCode: rule.exitCode };
  try {
    return { match: rule.match, pattern: new RegExp(rule.match.pattern), exitCode: rule.exitCode };
  } catch (error) {
    throw new ValidationError(`rules.${index}.match.pattern: invalid regular expression`, error);
  }
}

function propertyOf(link: unknown, key: string): unknown {
  return typeof link === "object" && link !== null && key in link
    ? Reflect.get(link, key)
    : undefined;
}

function messageOf(link: unknown): string {
  return link instanceof Error ? link.message : String(link);
}

function matches(rule: CompiledRule, link: unknown): boolean {
  const { name, code, message } = rule.match;
  if (name !== undefined && !(link instanceof Error && link.name === name)) return false;
  if (code !== undefined && propertyOf(link, "code") !== code) return false;
  if (message !== undefined && !messageOf(link).includes(message)) return false;
  if (rule.pattern && !rule.pattern.test(messageOf(link))) return false;
  return true;
}

/**
 * Compile configured rules into an error handler. Links are visited outermost
 * first; on each link the rules are tried in order and the first hit decides.
 */
export function createRuleHandler(rules: readonly Rule[]): ErrorHandler {
  const compiled = rules.map(compile);

  return (err) => {
    for (const link of walkErrorChain(err)) {
      const hit = compiled.find((rule) => matches(rule, link));
      if (hit) return { code: hit.exitCode, handled: true };
    }
    return { code: ExitCode.failure, handled: false };
  };
}
