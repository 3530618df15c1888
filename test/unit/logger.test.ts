import { describe, it, expect } from "vitest";
import { createLogger } from "../../src/logging/logger.js";

describe("createLogger", () => {
  it("defaults to info", () => {
    const logger = createLogger({ json: true });
    expect(logger.level).toBe("info");
  });

  it("applies the configured level", () => {
    const logger = createLogger({ json: true, level: "warn" });
    expect(logger.level).toBe("warn");
    expect(logger.isLevelEnabled("info")).toBe(false);
    expect(logger.isLevelEnabled("error")).toBe(true);
  });

  it("carries the app binding into children", () => {
    const logger = createLogger({ json: true });
    const child = logger.child({ component: "scheduler" });
    expect(child.bindings()).toEqual({ app: "cairn", component: "scheduler" });
  });
});
