/**
 * Logger tests.
 *
 * Run: node --import tsx --test src/logging/logger.test.ts
 */

import { strict as assert } from "node:assert";
import { describe, test } from "node:test";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { createLogger, formatLogEntry, isLogLevel, type LogLevel } from "./logger.js";
import { getLogger, setLogger } from "./shared.js";

describe("formatLogEntry", () => {
  const now = new Date("2026-01-02T03:04:05.000Z");

  test("writes timestamp, padded level and message", () => {
    assert.equal(formatLogEntry("info", "hello", undefined, now), "[2026-01-02T03:04:05.000Z] [INFO ] hello");
  });

  test("appends non-empty context as JSON", () => {
    assert.equal(
      formatLogEntry("error", "failed", { tags: 3 }, now),
      '[2026-01-02T03:04:05.000Z] [ERROR] failed {"tags":3}'
    );
    assert.equal(formatLogEntry("warn", "quiet", {}, now), "[2026-01-02T03:04:05.000Z] [WARN ] quiet");
  });
});

describe("createLogger", () => {
  test("drops entries below the configured level", () => {
    const levels: LogLevel[] = [];
    const logger = createLogger({ level: "warn", console: false, write: (level) => levels.push(level) });
    logger.debug("a");
    logger.info("b");
    logger.warn("c");
    logger.error("d");
    assert.deepEqual(levels, ["warn", "error"]);
  });

  test("appends entries to a log file", () => {
    const dir = mkdtempSync(join(tmpdir(), "tagstream-log-"));
    try {
      const logFile = join(dir, "nested", "markup.log");
      const logger = createLogger({ level: "info", console: false, logFile });
      logger.info("first");
      logger.error("second", { code: 1 });

      const lines = readFileSync(logFile, "utf-8").trimEnd().split("\n");
      assert.equal(lines.length, 2);
      assert.ok(lines[0].endsWith("[INFO ] first"), lines[0]);
      assert.ok(lines[1].endsWith('[ERROR] second {"code":1}'), lines[1]);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe("isLogLevel", () => {
  test("recognizes the four levels", () => {
    assert.ok(isLogLevel("debug"));
    assert.ok(isLogLevel("error"));
    assert.ok(!isLogLevel("trace"));
    assert.ok(!isLogLevel("toString"));
  });
});

describe("shared logger", () => {
  test("can be replaced and restored", () => {
    const custom = createLogger({ console: false });
    setLogger(custom);
    assert.equal(getLogger(), custom);
    setLogger(null);
    assert.notEqual(getLogger(), custom);
  });
});
