import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  childLogger,
  clearLogContext,
  logger,
  setLogContext,
  setLogLevel,
  type LogEntry,
} from "../../src/logger.js";

describe("logger", () => {
  let stdoutLines: string[];
  let stderrLines: string[];

  const capture = (lines: string[]) => (chunk: unknown) => {
    lines.push(typeof chunk === "string" ? chunk : String(chunk));
    return true;
  };

  beforeEach(() => {
    stdoutLines = [];
    stderrLines = [];
    vi.spyOn(process.stdout, "write").mockImplementation(capture(stdoutLines));
    vi.spyOn(process.stderr, "write").mockImplementation(capture(stderrLines));
    setLogLevel("debug");
    clearLogContext();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    setLogLevel("error");
    clearLogContext();
  });

  const parse = (line: string): LogEntry => JSON.parse(line) as LogEntry;

  it("outputs valid JSON with required fields", () => {
    logger.info("hello world");
    expect(stdoutLines).toHaveLength(1);

    const entry = parse(stdoutLines[0]);
    expect(typeof entry.ts).toBe("string");
    expect(entry.level).toBe("info");
    expect(entry.msg).toBe("hello world");
  });

  it("includes extra fields", () => {
    logger.info("with context", { session_id: "s-1", duration_ms: 42 });
    const entry = parse(stdoutLines[0]);
    expect(entry.session_id).toBe("s-1");
    expect(entry.duration_ms).toBe(42);
  });

  it("includes persistent context from setLogContext", () => {
    setLogContext({ service: "research-workflow", replica: "r1" });
    logger.info("tagged");
    const entry = parse(stdoutLines[0]);
    expect(entry.service).toBe("research-workflow");
    expect(entry.replica).toBe("r1");
  });

  it("sends error level to stderr", () => {
    logger.error("bad thing");
    expect(stdoutLines).toHaveLength(0);
    expect(stderrLines).toHaveLength(1);
    expect(parse(stderrLines[0]).level).toBe("error");
  });

  it("respects log level filtering", () => {
    setLogLevel("warn");
    logger.debug("hidden");
    logger.info("also hidden");
    logger.warn("visible");
    logger.error("also visible");

    expect(stdoutLines).toHaveLength(1);
    expect(stderrLines).toHaveLength(1);
  });

  it("child loggers stamp bound fields and let call-site fields win", () => {
    const log = childLogger({ component: "dispatcher", lane: "default" });
    log.warn("slow", { lane: "stream" });
    const entry = parse(stdoutLines[0]);
    expect(entry.component).toBe("dispatcher");
    expect(entry.lane).toBe("stream");
    expect(entry.level).toBe("warn");
  });
});
