import { tmpdir } from "node:os";
import { join } from "node:path";
import winston from "winston";
import { describe, expect, it } from "vitest";
import { createLogger } from "./logger.js";

describe("createLogger", () => {
  it("logs to the console only by default", () => {
    const logger = createLogger();

    expect(logger.level).toBe("info");
    expect(logger.transports).toHaveLength(1);
    expect(logger.transports[0]).toBeInstanceOf(winston.transports.Console);
  });

  it("adds a file transport when a log path is given", () => {
    const logger = createLogger({ level: "debug", logPath: join(tmpdir(), "upwork-feed-mailer.log") });

    expect(logger.level).toBe("debug");
    expect(logger.transports.map((transport) => transport.constructor)).toEqual([
      winston.transports.Console,
      winston.transports.File,
    ]);
    logger.close();
  });
});
