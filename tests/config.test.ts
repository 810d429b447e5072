import { describe, it, expect } from "vitest";
import {
  DEFAULT_CONFIG,
  loadLocators,
  resolveConfig,
} from "../src/config.js";
import { ConfigError } from "../src/utils/errors.js";

describe("resolveConfig", () => {
  it("falls back to the defaults", () => {
    expect(resolveConfig({}, {})).toEqual({
      workers: 5,
      timeoutMs: 5000,
      processingDelayMs: 500,
      encoding: "utf-8",
      delimiter: ",",
      verbose: false,
    });
    expect(resolveConfig({}, {})).toEqual(DEFAULT_CONFIG);
  });

  it("reads the environment", () => {
    const config = resolveConfig(
      {},
      {
        TABFETCH_WORKERS: "8",
        TABFETCH_TIMEOUT_MS: "1500",
        TABFETCH_PROCESSING_DELAY_MS: "0",
        TABFETCH_ENCODING: "latin1",
        TABFETCH_DELIMITER: ";",
        TABFETCH_VERBOSE: "yes",
      },
    );

    expect(config).toEqual({
      workers: 8,
      timeoutMs: 1500,
      processingDelayMs: 0,
      encoding: "latin1",
      delimiter: ";",
      verbose: true,
    });
  });

  it("ignores empty environment values", () => {
    expect(resolveConfig({}, { TABFETCH_WORKERS: "" }).workers).toBe(5);
  });

  it("lets the command line override the environment", () => {
    const config = resolveConfig(
      { workers: "3", timeout: 250, verbose: true },
      { TABFETCH_WORKERS: "8", TABFETCH_TIMEOUT_MS: "1500" },
    );

    expect(config.workers).toBe(3);
    expect(config.timeoutMs).toBe(250);
    expect(config.verbose).toBe(true);
  });

  it("pins the pool to one worker in sequential mode", () => {
    expect(resolveConfig({ workers: 10, sequential: true }, {}).workers).toBe(1);
  });

  it("rejects invalid values with the offending fields", () => {
    let caught: unknown;
    try {
      resolveConfig({ workers: "0", delimiter: ";;" }, {});
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.fields).toEqual(["workers", "delimiter"]);
      expect(caught.code).toBe("CONFIG_INVALID");
      expect(caught.message).toContain(
        "delimiter: must be a single character",
      );
    }
  });

  it("rejects a worker count above the limit", () => {
    expect(() => resolveConfig({ workers: 65 }, {})).toThrow(ConfigError);
  });

  it("rejects an unrecognised boolean", () => {
    expect(() => resolveConfig({}, { TABFETCH_VERBOSE: "maybe" })).toThrow(
      /^Invalid configuration: verbose: /,
    );
  });
});

describe("loadLocators", () => {
  it("keeps one trimmed locator per line", () => {
    const text = [
      "# sources",
      "https://data.test/a.csv",
      "",
      "  https://data.test/b.csv  ",
      "\r",
      "# https://data.test/skipped.csv",
      "https://data.test/a.csv",
    ].join("\n");

    expect(loadLocators(text)).toEqual([
      "https://data.test/a.csv",
      "https://data.test/b.csv",
      "https://data.test/a.csv",
    ]);
  });

  it("returns nothing for an empty file", () => {
    expect(loadLocators("")).toEqual([]);
  });
});
