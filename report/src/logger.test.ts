import { describe, expect, it } from "vitest";
import { createLogger } from "./logger";

describe("createLogger", () => {
  it("uses the configured level", () => {
    expect(createLogger("silent").level).toBe("silent");
    expect(createLogger("debug").level).toBe("debug");
  });
});
