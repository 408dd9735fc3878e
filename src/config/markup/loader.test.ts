/**
 * Markup option loader tests.
 *
 * Run: node --import tsx --test src/config/markup/loader.test.ts
 */

import { strict as assert } from "node:assert";
import { describe, test } from "node:test";

import { loadTagOptions, loadXmlPrologOptions, MarkupOptionsError } from "./loader.js";

describe("loadTagOptions", () => {
  test("applies defaults", () => {
    const options = loadTagOptions();
    assert.deepEqual(options, { shortenEmptyTag: true, cdataSection: false });
    assert.ok(Object.isFrozen(options));
  });

  test("keeps unknown keys", () => {
    assert.deepEqual(loadTagOptions({ indent: 2 }), { shortenEmptyTag: true, cdataSection: false, indent: 2 });
  });

  test("rejects wrong types with structured issues", () => {
    assert.throws(() => loadTagOptions({ shortenEmptyTag: "no" }), (err: unknown) => {
      assert.ok(err instanceof MarkupOptionsError);
      assert.equal(err.message, "Invalid tag options: 1 validation error(s)");
      assert.deepEqual(err.issues, [
        { path: ["shortenEmptyTag"], message: "Expected boolean, received string", code: "invalid_type" },
      ]);
      assert.equal(
        err.format(),
        "Markup option validation failed:\n  - shortenEmptyTag: Expected boolean, received string"
      );
      return true;
    });
  });
});

describe("loadXmlPrologOptions", () => {
  test("applies defaults", () => {
    assert.deepEqual(loadXmlPrologOptions(), { version: "1.0", encoding: "utf-8" });
  });

  test("accepts XML 1.x versions", () => {
    assert.equal(loadXmlPrologOptions({ version: "1.1" }).version, "1.1");
  });

  test("rejects unknown keys", () => {
    assert.throws(() => loadXmlPrologOptions({ indent: 2 }), (err: unknown) => {
      assert.ok(err instanceof MarkupOptionsError);
      assert.equal(err.issues[0].code, "unrecognized_keys");
      return true;
    });
  });

  test("rejects encodings that are not charset names", () => {
    assert.throws(() => loadXmlPrologOptions({ encoding: 'utf-8" x="' }), MarkupOptionsError);
  });
});
