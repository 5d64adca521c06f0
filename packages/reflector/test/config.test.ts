import { describe, it, expect } from "vitest";
import path from "node:path";

import { loadConfig } from "../src/index.js";

const CWD = path.resolve("/work");

describe("loadConfig", () => {
  it("applies defaults", () => {
    const result = loadConfig({}, CWD);

    expect(result).toEqual({
      ok: true,
      value: {
        projectRoot: CWD,
        vendorDir: "vendor",
        cacheTtlMs: 86_400_000,
        defaultScanPath: "app",
        logLevel: "info",
      },
    });
  });

  it("reads every variable", () => {
    const result = loadConfig(
      {
        PHPSCOPE_PROJECT_ROOT: "site",
        PHPSCOPE_VENDOR_DIR: "deps",
        PHPSCOPE_CACHE_TTL_MS: "1000",
        PHPSCOPE_DEFAULT_SCAN_PATH: "src",
        PHPSCOPE_LOG_LEVEL: "debug",
        UNRELATED: "ignored",
      },
      CWD
    );

    expect(result).toEqual({
      ok: true,
      value: {
        projectRoot: path.join(CWD, "site"),
        vendorDir: "deps",
        cacheTtlMs: 1000,
        defaultScanPath: "src",
        logLevel: "debug",
      },
    });
  });

  it("rejects a TTL that is not a number", () => {
    const result = loadConfig({ PHPSCOPE_CACHE_TTL_MS: "soon" }, CWD);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toMatch(/^Invalid configuration: PHPSCOPE_CACHE_TTL_MS: /);
  });

  it("rejects an unknown log level", () => {
    const result = loadConfig({ PHPSCOPE_LOG_LEVEL: "loud" }, CWD);

    expect(!result.ok && result.error.message).toMatch(/^Invalid configuration: PHPSCOPE_LOG_LEVEL: /);
  });

  it("rejects a vendor path", () => {
    const result = loadConfig({ PHPSCOPE_VENDOR_DIR: "lib/vendor" }, CWD);

    expect(!result.ok && result.error.message).toBe(
      "Invalid configuration: PHPSCOPE_VENDOR_DIR: must be a directory name, not a path"
    );
  });
});
