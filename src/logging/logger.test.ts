import { describe, expect, it } from "vitest";
import { createConsoleLogger, isLogLevel } from "./logger";

function capture() {
  const out: string[] = [];
  const err: string[] = [];
  return { out, err, sink: { out: (line: string) => out.push(line), err: (line: string) => err.push(line) } };
}

describe("createConsoleLogger", () => {
  it("drops messages below the threshold", () => {
    const { out, err, sink } = capture();
    const logger = createConsoleLogger("warn", sink);

    logger.debug("noise");
    logger.info("chatter");
    logger.warn("careful");
    logger.error("broken");

    expect(out).toEqual([]);
    expect(err).toEqual(["[warn] careful", "[error] broken"]);
  });

  it("prefixes scoped loggers and prints detail on its own line", () => {
    const { out, sink } = capture();
    const logger = createConsoleLogger("debug", sink).scoped("audio").scoped("sox");

    logger.info("Recording...", "device default");

    expect(out).toEqual(["[info] [audio:sox] Recording...", "device default"]);
  });
});

describe("isLogLevel", () => {
  it("recognises the four levels only", () => {
    expect(["debug", "info", "warn", "error"].every(isLogLevel)).toBe(true);
    expect(isLogLevel("trace")).toBe(false);
  });
});
