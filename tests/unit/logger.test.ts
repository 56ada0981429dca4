/**
 * Unit tests for logger level resolution and context binding
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import * as logger from "@/logger";

describe("resolveLogLevel", () => {
  it("should accept known levels case-insensitively", () => {
    expect(logger.resolveLogLevel("debug")).toBe("debug");
    expect(logger.resolveLogLevel(" WARN ")).toBe("warn");
  });

  it("should fall back to info", () => {
    expect(logger.resolveLogLevel(undefined)).toBe("info");
    expect(logger.resolveLogLevel("verbose")).toBe("info");
    expect(logger.resolveLogLevel("toString")).toBe("info");
  });
});

describe("withContext", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should merge bound context into the line", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});

    logger.withContext({ area: "1" }).error("Search failed", { page: 2 });

    expect(errorSpy).toHaveBeenCalledTimes(1);
    const line = String(errorSpy.mock.calls[0][0]);
    expect(line).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[ERROR\] Search failed \{"area":"1","page":2\}$/);
  });
});
