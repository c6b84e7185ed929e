import { format } from "node:util";

const verbPattern = /%([sdifjoOcw%])/g;

/**
 * Build an error from a `util.format` style template.
 *
 * `%w` takes an error argument, renders its message, and records it as the
 * new error's `cause`. With more than one `%w` the cause is an
 * `AggregateError` of all of them, in order. Arguments left over after the
 * template are appended the way `util.format` appends them.
 */
export function errorf(template: string, ...args: unknown[]): Error {
  const wrapped: Error[] = [];
  let next = 0;

  let message = template.replace(verbPattern, (match: string, verb: string) => {
    if (verb === "%") return "%";
    if (next >= args.length) return match;
    const arg = args[next++];
    if (verb === "w") {
      if (arg instanceof Error) {
        wrapped.push(arg);
        return arg.message;
      }
      return String(arg);
    }
    return format(`%${verb}`, arg);
  });
  for (const extra of args.slice(next)) {
    message += ` ${format(extra)}`;
  }

  const [first, ...others] = wrapped;
  if (!first) return new Error(message);
  if (others.length === 0) return new Error(message, { cause: first });
  return new Error(message, { cause: new AggregateError(wrapped, message) });
}
