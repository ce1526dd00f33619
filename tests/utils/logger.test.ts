/**
 * Logger Tests
 */

import { describe, it, expect } from "vitest";
import { config } from "../../src/config/index.js";
import { logger, moduleLogger } from "../../src/utils/logger.js";

describe("logger", () => {
  it("should take its level from the validated config", () => {
    expect(logger.level).toBe(config.logLevel);
  });

  it("should share the level with module loggers", () => {
    expect(moduleLogger("events").level).toBe(config.logLevel);
  });
});
