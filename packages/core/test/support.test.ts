import { afterEach, describe, it, expect } from "vitest";
import { loadConfiguration } from "../src/configuration/index.js";
import { canonicalize, fingerprint } from "../src/hash.js";
import { GraphformError, invalidDocument, unwrap } from "../src/errors/index.js";
import { collect, err, map, ok, Result } from "../src/result/result.js";
import { checkNonEmptyString } from "../src/validation/index.js";
import {
  createLogger,
  getLogLevel,
  LogSink,
  resetLogging,
  setLogLevel,
  setLogSink,
} from "../src/logging/index.js";

describe("loadConfiguration", () => {
  it("fills in defaults", () => {
    expect(loadConfiguration()).toEqual({
      success: true,
      data: {
        cycles: "reference",
        sharedReferences: "copy",
        maxNodes: 100_000,
        coerce: false,
        unknownAttributes: "ignore",
        debug: false,
      },
    });
  });

  it("keeps given values", () => {
    const result = loadConfiguration({ cycles: "error", maxNodes: 10 });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.cycles).toBe("error");
      expect(result.data.maxNodes).toBe(10);
    }
  });

  it("reports invalid input as an invalid document", () => {
    const result = loadConfiguration({ maxNodes: 0 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.type).toBe("invalidDocument");
      expect(result.error.message).toMatch(/^Invalid serializer configuration:\n/);
      expect(result.error.message).toContain("maxNodes");
    }
  });
});

describe("fingerprint", () => {
  it("ignores key order", () => {
    expect(fingerprint({ a: 1, b: { c: true, d: null } })).toBe(
      fingerprint({ b: { d: null, c: true }, a: 1 })
    );
  });

  it("respects sequence order", () => {
    expect(fingerprint([1, 2])).not.toBe(fingerprint([2, 1]));
  });

  it("keeps a __proto__ key", () => {
    const withKey = JSON.parse('{"__proto__": 1, "a": 2}');
    expect(JSON.stringify(canonicalize(withKey))).toBe('{"__proto__":1,"a":2}');
  });

  it("sorts keys recursively", () => {
    expect(JSON.stringify(canonicalize({ b: 1, a: { d: 2, c: 3 } }))).toBe(
      '{"a":{"c":3,"d":2},"b":1}'
    );
  });
});

describe("Result helpers", () => {
  it("maps successes only", () => {
    expect(map(ok(2), (n: number) => n * 3)).toEqual({ success: true, data: 6 });
    expect(map(err("no"), (n: number) => n * 3)).toEqual({ success: false, error: "no" });
  });

  it("collects until the first failure", () => {
    const good: Result<number, string>[] = [ok(1), ok(2)];
    const bad: Result<number, string>[] = [ok(1), err("first"), err("second")];
    expect(collect(good)).toEqual({ success: true, data: [1, 2] });
    expect(collect(bad)).toEqual({
      success: false,
      error: "first",
    });
  });

  it("unwraps or throws a GraphformError", () => {
    expect(unwrap(ok(5))).toBe(5);
    const detail = invalidDocument("broken");
    try {
      unwrap(err(detail));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(GraphformError);
      if (error instanceof GraphformError) {
        expect(error.message).toBe("broken");
        expect(error.detail).toBe(detail);
      }
    }
  });
});

describe("checkNonEmptyString", () => {
  it("accepts text", () => {
    expect(checkNonEmptyString("x", "name")).toEqual({ success: true, data: "x" });
  });

  it("describes what it got instead", () => {
    const result = checkNonEmptyString(null, "name", "#/name");
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe(
        'Attribute "name" at #/name expected non-empty string, got null'
      );
    }
  });
});

describe("logger", () => {
  const lines: string[] = [];
  const sink: LogSink = (level, scope, message) => {
    lines.push(`${level} ${scope} ${message}`);
  };

  afterEach(() => {
    lines.length = 0;
    resetLogging();
  });

  it("emits warnings and above by default", () => {
    setLogSink(sink);
    const logger = createLogger("test");
    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("careful");
    logger.error("broken");

    expect(getLogLevel()).toBe("warn");
    expect(lines).toEqual(["warn test careful", "error test broken"]);
  });

  it("follows the global level set after creation", () => {
    setLogSink(sink);
    const logger = createLogger("test");
    setLogLevel("debug");
    logger.debug("trace");
    setLogLevel("silent");
    logger.error("muted");

    expect(lines).toEqual(["debug test trace"]);
  });

  it("lets a logger pin its own level", () => {
    setLogSink(sink);
    const logger = createLogger("pinned", { level: "debug" });
    logger.debug("trace");
    expect(lines).toEqual(["debug pinned trace"]);
  });
});
