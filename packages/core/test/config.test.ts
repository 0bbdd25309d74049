import { describe, it } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import {
  ConfigError,
  compilePattern,
  expectInteger,
  expectObject,
  expectString,
  optionalBoolean,
  optionalString,
  optionalStringArray,
  optionalStringRecord,
  parseJsonText,
  readJsonFile,
  stripJsonComments,
} from "../src/config.js";

describe("stripJsonComments", () => {
  it("removes whole-line comments and trailing commas", () => {
    const text = '{\n  // comment\n  "a": [1, 2,],\n  "b": "x",\n}';
    assert.deepEqual(JSON.parse(stripJsonComments(text)), { a: [1, 2], b: "x" });
  });

  it("keeps // inside string values", () => {
    const text = '{ "url": "https://example.com/path" }';
    assert.deepEqual(JSON.parse(stripJsonComments(text)), {
      url: "https://example.com/path",
    });
  });

  it("leaves commas before } or ] inside strings alone", () => {
    const text = '{ "re": "\\\\d{6,}", "cls": "[^,]+", "list": ["a,]", "b",], }';
    assert.deepEqual(JSON.parse(stripJsonComments(text)), {
      re: "\\d{6,}",
      cls: "[^,]+",
      list: ["a,]", "b"],
    });
  });

  it("tracks escaped quotes inside strings", () => {
    const text = '{ "q": "a\\",}", "n": 1 }';
    assert.deepEqual(JSON.parse(stripJsonComments(text)), { q: 'a",}', n: 1 });
  });

  it("removes trailing comments, including one between a comma and }", () => {
    const text = '{\n  "n": 1, // last one\n}';
    assert.deepEqual(JSON.parse(stripJsonComments(text)), { n: 1 });
  });
});

describe("parseJsonText", () => {
  it("parses JSONC", () => {
    assert.deepEqual(parseJsonText('// header\n{"x": 1,}'), { x: 1 });
  });

  it("wraps syntax errors in ConfigError naming the source", () => {
    assert.throws(
      () => parseJsonText("{ nope", "routes.json"),
      (err: unknown) =>
        err instanceof ConfigError && err.message.startsWith("routes.json is not valid JSON"),
    );
  });
});

describe("readJsonFile", () => {
  it("reads a file from disk", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "edgeward-config-"));
    const file = path.join(dir, "c.json");
    fs.writeFileSync(file, '{ "log_level": "debug" }');
    try {
      assert.deepEqual(readJsonFile(file), { log_level: "debug" });
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("reports a missing file as ConfigError", () => {
    assert.throws(
      () => readJsonFile("/nonexistent/edgeward.json"),
      (err: unknown) =>
        err instanceof ConfigError && err.message.startsWith("cannot read /nonexistent/edgeward.json"),
    );
  });
});

describe("field readers", () => {
  it("prefixes messages with the field path", () => {
    try {
      expectObject([], "rules[0]");
      assert.fail("expected ConfigError");
    } catch (err: unknown) {
      assert.ok(err instanceof ConfigError);
      assert.equal(err.field, "rules[0]");
      assert.equal(err.message, "rules[0]: expected an object, got array");
    }
  });

  it("expectString rejects empty strings and non-strings", () => {
    assert.equal(expectString("v2", "target"), "v2");
    assert.throws(() => expectString("", "target"), /target: must not be empty/);
    assert.throws(() => expectString(3, "target"), /target: expected a string, got number/);
  });

  it("expectInteger enforces integers and the lower bound", () => {
    assert.equal(expectInteger(5, "n"), 5);
    assert.throws(() => expectInteger(1.5, "n"), /n: expected an integer, got number/);
    assert.throws(() => expectInteger("5", "n"), /n: expected an integer, got string/);
    assert.throws(() => expectInteger(0, "n", 1), /n: must be at least 1/);
  });

  it("optional readers fall back on undefined and null", () => {
    assert.equal(optionalString(undefined, "f", "dflt"), "dflt");
    assert.equal(optionalString(null, "f", "dflt"), "dflt");
    assert.equal(optionalBoolean(undefined, "f", true), true);
    assert.throws(() => optionalBoolean("yes", "f", false), /f: expected a boolean, got string/);
    assert.deepEqual(optionalStringArray(undefined, "f"), []);
    assert.deepEqual(optionalStringArray(["a", "b"], "f"), ["a", "b"]);
    assert.throws(() => optionalStringArray(["a", 1], "f"), /f\[1\]: expected a string/);
  });

  it("optionalStringRecord allows empty values but not non-strings", () => {
    assert.deepEqual(optionalStringRecord({ a: "", b: "x" }, "h"), { a: "", b: "x" });
    assert.throws(() => optionalStringRecord({ a: 1 }, "h"), /h\.a: expected a string, got number/);
  });
});

describe("compilePattern", () => {
  it("compiles with the given flags", () => {
    const re = compilePattern("^/api", "f", "g");
    assert.equal(re.source, "^\\/api");
    assert.equal(re.flags, "gu");
  });

  it("turns a leading (?i) into the i flag", () => {
    const re = compilePattern("(?i)chrome", "f");
    assert.equal(re.source, "chrome");
    assert.ok(re.test("Mozilla Chrome/120"));
  });

  it("does not duplicate the i flag", () => {
    assert.equal(compilePattern("(?i)x", "f", "i").flags, "iu");
  });

  it("compiles in Unicode mode", () => {
    const re = compilePattern("^\\p{Lu}\\p{Ll}+$", "f");
    assert.ok(re.test("Émile"));
    assert.ok(!re.test("p{Lu}"));
  });

  it("reports an invalid pattern as ConfigError on the field", () => {
    assert.throws(
      () => compilePattern("(unclosed", "rules[0].conditions[0].value"),
      (err: unknown) =>
        err instanceof ConfigError && err.field === "rules[0].conditions[0].value",
    );
  });
});
