import { createWriteStream, existsSync, mkdirSync, renameSync, rmSync } from "node:fs";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const fsState = vi.hoisted(() => ({ size: 0 }));

vi.mock("node:fs", () => ({
  createWriteStream: vi.fn(),
  existsSync: vi.fn(),
  mkdirSync: vi.fn(),
  renameSync: vi.fn(),
  rmSync: vi.fn(),
  statSync: vi.fn(() => ({ size: fsState.size })),
}));

import { createLogger, createRotatingLogStream } from "./logger";

describe("logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should write info messages to stderr", () => {
    const consoleSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    createLogger({ level: "info" }).info("test message");
    expect(consoleSpy).toHaveBeenCalledWith(expect.stringContaining("| INFO | test message"));
  });

  it("should never write to stdout", () => {
    const stdoutSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    createLogger({ level: "debug" }).info("test message");
    expect(stdoutSpy).not.toHaveBeenCalled();
  });

  it("should skip messages below the configured level", () => {
    const consoleSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    createLogger({ level: "warn" }).info("quiet");
    expect(consoleSpy).not.toHaveBeenCalled();
  });

  it("should include context in logs", () => {
    const consoleSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    createLogger({ level: "info" }).info("test message", { foo: "bar" });
    expect(consoleSpy).toHaveBeenCalledWith(expect.stringContaining('{"foo":"bar"}'));
  });

  it("should include the error name and message", () => {
    const consoleSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    createLogger({ level: "info" }).error("test error", new TypeError("boom"));
    expect(consoleSpy).toHaveBeenCalledWith(expect.stringContaining("(TypeError: boom)"));
  });

  it("should send JSON lines to the file sink at its own level", () => {
    const consoleSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const sink = { write: vi.fn() };
    const logger = createLogger({ level: "info", file: { sink, level: "debug" } });

    logger.debug("request params", { symbol: "BTCUSDT" });

    expect(consoleSpy).not.toHaveBeenCalled();
    expect(sink.write).toHaveBeenCalledTimes(1);
    const line = String(sink.write.mock.calls[0]?.[0]);
    expect(line.endsWith("\n")).toBe(true);
    const entry: unknown = JSON.parse(line);
    expect(entry).toMatchObject({
      level: "debug",
      message: "request params",
      context: { symbol: "BTCUSDT" },
    });
  });
});

describe("createRotatingLogStream", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    fsState.size = 0;
  });

  it("should create log directory if it does not exist", () => {
    vi.mocked(existsSync).mockReturnValue(false);

    createRotatingLogStream({ path: "logs/order-cli.log" });

    expect(existsSync).toHaveBeenCalledWith("logs");
    expect(mkdirSync).toHaveBeenCalledWith("logs", { recursive: true });
  });

  it("should not create log directory if it exists", () => {
    vi.mocked(existsSync).mockReturnValue(true);

    createRotatingLogStream({ path: "logs/order-cli.log" });

    expect(mkdirSync).not.toHaveBeenCalled();
  });

  it("should open the log file for appending", () => {
    vi.mocked(existsSync).mockReturnValue(false);

    createRotatingLogStream({ path: "logs/order-cli.log" });

    expect(createWriteStream).toHaveBeenCalledWith("logs/order-cli.log", {
      flags: "a",
      encoding: "utf8",
    });
  });

  it("should not rotate a file below the size limit", () => {
    vi.mocked(existsSync).mockReturnValue(true);
    fsState.size = 100;

    createRotatingLogStream({ path: "logs/order-cli.log", maxBytes: 1024 });

    expect(renameSync).not.toHaveBeenCalled();
    expect(rmSync).not.toHaveBeenCalled();
  });

  it("should rotate backups once the file reaches the size limit", () => {
    vi.mocked(existsSync).mockReturnValue(true);
    fsState.size = 1024;

    createRotatingLogStream({ path: "logs/order-cli.log", maxBytes: 1024, maxFiles: 2 });

    expect(rmSync).toHaveBeenCalledWith("logs/order-cli.log.2");
    expect(vi.mocked(renameSync).mock.calls).toEqual([
      ["logs/order-cli.log.1", "logs/order-cli.log.2"],
      ["logs/order-cli.log", "logs/order-cli.log.1"],
    ]);
    expect(createWriteStream).toHaveBeenCalledWith("logs/order-cli.log", {
      flags: "a",
      encoding: "utf8",
    });
  });
});
