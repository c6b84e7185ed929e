import { describe, expect, it } from "vitest";
import { createRuleHandler } from "../../src/application/policy/rule-handler";
import { ConfigError, ValidationError } from "../../src/domain/common/errors";
import { withExitCode } from "../../src/domain/exit/carrier";
import { errorf } from "../../src/domain/exit/errorf";
import { createExitCodeResolver } from "../../src/domain/exit/resolver";
import { AppConfigSchema } from "../../src/infrastructure/config/schema";

const rules = AppConfigSchema.parse({
  rules: [
    { match: { code: "ENOENT" }, exitCode: "noInput" },
    { match: { pattern: "^HTTP 5\\d\\d" }, exitCode: "unavailable" },
    { match: { message: "timeout" }, exitCode: 75 },
    { match: { name: "ConfigError" }, exitCode: "config" },
    { match: { code: 404 }, exitCode: 66 },
    { match: { name: "TypeError", message: "token" }, exitCode: "dataErr" },
  ],
}).rules;

const enoent = () => Object.assign(new Error("open x.txt: no such file"), { code: "ENOENT" });

describe("createRuleHandler", () => {
  const handler = createRuleHandler(rules);

  it("matches on the code property", () => {
    expect(handler(enoent())).toEqual({ code: 66, handled: true });
    expect(handler(Object.assign(new Error("not found"), { code: 404 }))).toEqual({
      code: 66,
      handled: true,
    });
  });

  it("matches wrapped links", () => {
    expect(handler(errorf("load: %w", enoent()))).toEqual({ code: 66, handled: true });
  });

  it("matches message patterns and substrings", () => {
    expect(handler(new Error("HTTP 503 from upstream"))).toEqual({ code: 69, handled: true });
    expect(handler(new Error("upstream HTTP 503"))).toEqual({ code: 1, handled: false });
    expect(handler(new Error("request timeout"))).toEqual({ code: 75, handled: true });
  });

  it("decides on the outermost matching link", () => {
    const err = new ConfigError("load failed", new Error("request timeout"));
    expect(handler(err)).toEqual({ code: 78, handled: true });
  });

  it("requires every field of a match", () => {
    expect(handler(new Error("bad token"))).toEqual({ code: 1, handled: false });
    expect(handler(new TypeError("bad token"))).toEqual({ code: 65, handled: true });
  });

  it("leaves unmatched errors to the builtin rules", () => {
    expect(handler(new Error("boom"))).toEqual({ code: 1, handled: false });
  });

  it("rejects an invalid pattern", () => {
    expect(() => createRuleHandler([{ match: { pattern: "(" }, exitCode: 1 }])).toThrow(
      ValidationError,
    );
  });

  it("gets first refusal in a resolver", () => {
    const resolver = createExitCodeResolver({ handler });
    expect(resolver.resolve(withExitCode(70, enoent()))).toBe(66);
    expect(resolver.resolve(withExitCode(70, new Error("boom")))).toBe(70);
  });
});

describe("RuleSchema", () => {
  it("rejects empty matches and unknown codes", () => {
    expect(AppConfigSchema.safeParse({ rules: [{ match: {}, exitCode: 3 }] }).success).toBe(false);
    expect(
      AppConfigSchema.safeParse({ rules: [{ match: { name: "E" }, exitCode: "bogus" }] }).success,
    ).toBe(false);
    expect(
      AppConfigSchema.safeParse({ rules: [{ match: { name: "E" }, exitCode: 300 }] }).success,
    ).toBe(false);
  });
});
