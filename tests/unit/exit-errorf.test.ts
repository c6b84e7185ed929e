import { describe, expect, it } from "vitest";
import { errorf } from "../../src/domain/exit/errorf";

describe("errorf", () => {
  it("builds a plain error", () => {
    const err = errorf("plain");
    expect(err.message).toBe("plain");
    expect(err.cause).toBeUndefined();
  });

  it("formats util.format verbs", () => {
    expect(errorf("%d%% done", 50).message).toBe("50% done");
    expect(errorf("data %j", { a: 1 }).message).toBe('data {"a":1}');
    expect(errorf("value %s").message).toBe("value %s");
  });

  it("appends leftover arguments", () => {
    expect(errorf("a", "b", 3).message).toBe("a b 3");
  });

  it("wraps the %w argument", () => {
    const eof = new Error("EOF");
    const err = errorf("read %s: %w", "a.txt", eof);
    expect(err.message).toBe("read a.txt: EOF");
    expect(err.cause).toBe(eof);
  });

  it("wraps several %w arguments in an AggregateError", () => {
    const first = new Error("e1");
    const second = new Error("e2");
    const err = errorf("x: %w; %w", first, second);

    expect(err.message).toBe("x: e1; e2");
    expect(err.cause).toBeInstanceOf(AggregateError);
    expect(err.cause instanceof AggregateError && err.cause.errors).toEqual([first, second]);
  });

  it("renders a %w argument that is not an error", () => {
    const err = errorf("got %w", 42);
    expect(err.message).toBe("got 42");
    expect(err.cause).toBeUndefined();
  });
});
