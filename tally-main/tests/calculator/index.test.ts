import { afterEach, describe, expect, it, vi } from "vitest";
import { CalculatorSession, identifierAtEnd, identifierRange } from "../../src/calculator/index.js";
import { loadSettings } from "../../src/config/settings.js";
import { setDebugLogging } from "../../src/shared/index.js";

afterEach(() => {
  setDebugLogging(false);
  vi.restoreAllMocks();
});

describe("CalculatorSession", () => {
  it("commits a result and formats it", () => {
    const session = new CalculatorSession();
    const result = session.commit("2 + 2");
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.output).toBe("4");
    expect(result.statement.kind).toBe("expression");
    expect(session.lastResult.toString()).toBe("4");
  });

  it("feeds the last commit into ans", () => {
    const session = new CalculatorSession();
    session.commit("2+2");
    expect(session.commit("ans*2")).toMatchObject({ ok: true, output: "8" });
  });

  it("starts with ans at zero", () => {
    expect(new CalculatorSession().commit("ans")).toMatchObject({ ok: true, output: "0" });
  });

  it("previews without changing state", () => {
    const session = new CalculatorSession();
    session.commit("5");
    expect(session.preview("x = 9")).toMatchObject({ ok: true, output: "9" });
    expect(session.lastResult.toString()).toBe("5");
    expect(session.preview("x")).toMatchObject({
      ok: false,
      error: "Undeclared variable 'x'",
      code: "UNDECLARED_VARIABLE",
      pos: 0,
    });
  });

  it("keeps state unchanged when a commit fails", () => {
    const session = new CalculatorSession();
    session.commit("3");
    expect(session.commit("x = 1 +")).toMatchObject({ ok: false, code: "UNEXPECTED_TOKEN", pos: 7 });
    expect(session.env.has("x")).toBe(false);
    expect(session.lastResult.toString()).toBe("3");
  });

  it("defines functions across commits", () => {
    const session = new CalculatorSession();
    expect(session.commit("f(x) = x^2")).toMatchObject({ ok: true, output: "1" });
    expect(session.commit("f(3)")).toMatchObject({ ok: true, output: "9" });
  });

  it("drops literal digits beyond the working precision", () => {
    const session = new CalculatorSession();
    expect(session.commit(`1.${"0".repeat(100)}1 - 1`)).toMatchObject({ ok: true, output: "0" });
  });

  it("ranks NaN highest in max", () => {
    expect(new CalculatorSession().commit("max(1, sqrt(-1))")).toMatchObject({ ok: true, output: "NaN" });
  });

  it("reports an oversized sin argument as a calculator error", () => {
    expect(new CalculatorSession().commit("sin(10^1100)")).toMatchObject({
      ok: false,
      code: "PRECISION_LIMIT",
      error: "Argument of 'sin' is too large",
      pos: 0,
    });
  });

  it("formats with the configured digit count", () => {
    const session = new CalculatorSession(loadSettings({ TALLY_DISPLAY_DIGITS: "4" }));
    expect(session.commit("12346")).toMatchObject({ ok: true, output: "1.235e4" });
  });

  it("applies the configured call depth", () => {
    const session = new CalculatorSession(loadSettings({ TALLY_MAX_CALL_DEPTH: "5" }));
    session.commit("r(n) = r(n)");
    expect(session.commit("r(1)")).toMatchObject({
      ok: false,
      code: "RECURSION_LIMIT",
      error: "Maximum call depth 5 exceeded",
    });
  });

  it("completes names from the environment", () => {
    const session = new CalculatorSession();
    session.commit("sq = 4");
    expect(session.complete("sq")).toEqual([
      { name: "sq", kind: "variable" },
      { name: "sqrt", kind: "function" },
    ]);
    expect(session.complete("s").map((c) => c.name)).toEqual(["sin", "sq", "sqrt", "sum"]);
  });

  it("exposes the scanner for highlighting", () => {
    expect(new CalculatorSession().tokens("1+").map((t) => t.type)).toEqual(["NUMBER", "PLUS", "EOF"]);
  });

  it("logs commits when debug output is enabled", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const session = new CalculatorSession(loadSettings({ TALLY_DEBUG: "1" }));
    session.commit("1+1");
    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0]?.[2]).toBe('commit "1+1" = 2');
  });

  it("reports host stack exhaustion as an internal error", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const session = new CalculatorSession(loadSettings({ TALLY_DEBUG: "1" }));
    const deep = `${"(".repeat(100000)}1${")".repeat(100000)}`;
    expect(session.preview(deep)).toMatchObject({ ok: false, code: "INTERNAL", pos: 0 });
    expect(spy).toHaveBeenCalledTimes(1);
  });

  it("stays quiet by default", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    new CalculatorSession().commit("1+");
    expect(spy).not.toHaveBeenCalled();
  });
});

describe("identifier lookup", () => {
  it("finds the identifier before a position", () => {
    expect(identifierAtEnd("1abc")).toBe("abc");
    expect(identifierAtEnd("abc+bob1bob1")).toBe("bob1bob1");
    expect(identifierAtEnd("abc ")).toBeUndefined();
    expect(identifierAtEnd("12")).toBeUndefined();
    expect(identifierAtEnd("")).toBeUndefined();
  });

  it("returns the range ending at the cursor", () => {
    expect(identifierRange("sq+2", 2)).toEqual({ start: 0, end: 2 });
    expect(identifierRange("1 + ab", 5)).toEqual({ start: 4, end: 5 });
  });
});
