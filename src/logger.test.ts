import fs from "fs";
import os from "os";
import path from "path";
import { describe, expect, it } from "vitest";
import { createLogger } from "./logger.js";

describe("createLogger", () => {
  it("drops messages below the configured level", () => {
    const lines: string[] = [];
    const logger = createLogger({ level: "warn", sink: (line) => lines.push(line) });

    logger.debug("noise");
    logger.info("progress");
    logger.warn("disk almost full");
    logger.error("push rejected");

    expect(lines).toHaveLength(2);
    expect(lines[0]).toContain("WARN ");
    expect(lines[0]).toContain("disk almost full");
    expect(lines[1]).toContain("ERROR");
    expect(lines[1]).toContain("push rejected");
  });

  it("appends plain lines to the log file", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "note-skills-log-"));
    const file = path.join(dir, "skills.log");
    try {
      const logger = createLogger({ level: "info", file, sink: () => undefined });
      logger.warn("disk almost full");

      expect(fs.readFileSync(file, "utf-8")).toMatch(/^\[.+\] WARN  disk almost full\n$/);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
