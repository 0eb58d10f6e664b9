import { describe, test, expect, vi } from "vitest";
import { ConsoleLogger, createLogger, formatMessage, isLogLevel } from "../logger.js";

function recordingSink() {
  return { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() };
}

describe("formatMessage", () => {
  test("returns the bare message without context", () => {
    expect(formatMessage("hello")).toBe("hello");
    expect(formatMessage("hello", {})).toBe("hello");
  });

  test("appends context as JSON", () => {
    expect(formatMessage("built", { blueprint: "demo.CalcProxy", methods: 2 })).toBe(
      'built {"blueprint":"demo.CalcProxy","methods":2}',
    );
  });

  test("renders bigints as strings", () => {
    expect(formatMessage("n", { n: 5n })).toBe('n {"n":"5"}');
  });

  test("renders cycles as [Circular]", () => {
    const node: Record<string, unknown> = {};
    node.self = node;
    expect(formatMessage("m", { node })).toBe('m {"node":{"self":"[Circular]"}}');
  });
});

describe("ConsoleLogger", () => {
  test("writes prefixed messages at or above its level", () => {
    const sink = recordingSink();
    const logger = new ConsoleLogger("warnings", sink);

    logger.error("failed", { code: "x" });
    logger.warn("careful");
    logger.info("hidden");
    logger.debug("hidden");

    expect(sink.error).toHaveBeenCalledWith('[ERROR] failed {"code":"x"}');
    expect(sink.warn).toHaveBeenCalledWith("[WARN] careful");
    expect(sink.info).not.toHaveBeenCalled();
    expect(sink.debug).not.toHaveBeenCalled();
  });

  test("debug level enables trace", () => {
    const sink = recordingSink();
    const logger = createLogger("debug", sink);

    logger.trace("step");
    logger.debug("detail");

    expect(sink.debug).toHaveBeenNthCalledWith(1, "[TRACE] step");
    expect(sink.debug).toHaveBeenNthCalledWith(2, "[DEBUG] detail");
  });

  test("silent writes nothing", () => {
    const sink = recordingSink();
    const logger = new ConsoleLogger("silent", sink);

    logger.error("nothing");
    logger.warn("nothing");

    expect(sink.error).not.toHaveBeenCalled();
    expect(sink.warn).not.toHaveBeenCalled();
  });

  test("defaults to info", () => {
    expect(new ConsoleLogger().level).toBe("info");
  });
});

describe("isLogLevel", () => {
  test("accepts known levels only", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
