/**
 * Environment configuration tests.
 *
 * Run: node --import tsx --test src/config/config.test.ts
 */

import { strict as assert } from "node:assert";
import { afterEach, describe, test } from "node:test";

import { loadConfig, validateConfig, ConfigError, type AppConfig } from "./index.js";
import { optionalEnv, optionalEnvBool, maybeEnv } from "./env.js";

const TOUCHED = ["TAGSTREAM_TEST_VALUE", "LOG_LEVEL", "LOG_FILE", "LOG_CONSOLE"];
const saved = new Map(TOUCHED.map((key) => [key, process.env[key]]));

afterEach(() => {
  for (const [key, value] of saved) {
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
});

describe("env helpers", () => {
  test("optionalEnv falls back on unset or empty values", () => {
    delete process.env.TAGSTREAM_TEST_VALUE;
    assert.equal(optionalEnv("TAGSTREAM_TEST_VALUE", "fallback"), "fallback");
    process.env.TAGSTREAM_TEST_VALUE = "";
    assert.equal(optionalEnv("TAGSTREAM_TEST_VALUE", "fallback"), "fallback");
    assert.equal(maybeEnv("TAGSTREAM_TEST_VALUE"), undefined);
    process.env.TAGSTREAM_TEST_VALUE = "set";
    assert.equal(optionalEnv("TAGSTREAM_TEST_VALUE", "fallback"), "set");
    assert.equal(maybeEnv("TAGSTREAM_TEST_VALUE"), "set");
  });

  test("optionalEnvBool parses yes/no words", () => {
    process.env.TAGSTREAM_TEST_VALUE = "YES";
    assert.equal(optionalEnvBool("TAGSTREAM_TEST_VALUE", false), true);
    process.env.TAGSTREAM_TEST_VALUE = "0";
    assert.equal(optionalEnvBool("TAGSTREAM_TEST_VALUE", true), false);
    delete process.env.TAGSTREAM_TEST_VALUE;
    assert.equal(optionalEnvBool("TAGSTREAM_TEST_VALUE", true), true);
  });

  test("optionalEnvBool rejects other words", () => {
    process.env.TAGSTREAM_TEST_VALUE = "maybe";
    assert.throws(
      () => optionalEnvBool("TAGSTREAM_TEST_VALUE", true),
      new ConfigError(
        "Environment variable TAGSTREAM_TEST_VALUE must be a boolean (true/false/1/0/yes/no), got: maybe"
      )
    );
  });
});

describe("loadConfig", () => {
  test("reads logging settings", () => {
    process.env.LOG_LEVEL = "debug";
    process.env.LOG_FILE = "logs/tagstream.log";
    process.env.LOG_CONSOLE = "false";
    const loaded = loadConfig();
    assert.equal(loaded.logLevel, "debug");
    assert.equal(loaded.logFile, "logs/tagstream.log");
    assert.equal(loaded.logConsole, false);
    assert.ok(Object.isFrozen(loaded));
  });

  test("defaults to warnings on the console without a file", () => {
    delete process.env.LOG_LEVEL;
    delete process.env.LOG_FILE;
    delete process.env.LOG_CONSOLE;
    const loaded = loadConfig();
    assert.equal(loaded.logLevel, "warn");
    assert.equal(loaded.logFile, undefined);
    assert.equal(loaded.logConsole, true);
  });

  test("keeps unknown values instead of throwing", () => {
    process.env.LOG_LEVEL = "trace";
    process.env.LOG_CONSOLE = "verbose";
    const loaded = loadConfig();
    assert.equal(loaded.logLevel, "trace");
    assert.equal(loaded.logConsole, true);
  });
});

describe("validateConfig", () => {
  const valid: AppConfig = { logLevel: "info", logConsole: true };

  test("accepts known values", () => {
    delete process.env.LOG_CONSOLE;
    assert.doesNotThrow(() => validateConfig(valid));
  });

  test("rejects an unknown LOG_CONSOLE word", () => {
    process.env.LOG_CONSOLE = "verbose";
    assert.throws(
      () => validateConfig(valid),
      new ConfigError(
        "Environment variable LOG_CONSOLE must be a boolean (true/false/1/0/yes/no), got: verbose"
      )
    );
  });

  test("rejects an unknown log level", () => {
    assert.throws(
      () => validateConfig({ ...valid, logLevel: "trace" }),
      new ConfigError("Invalid LOG_LEVEL: trace. Must be debug, info, warn, or error.")
    );
  });
});
