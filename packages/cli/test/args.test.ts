import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { getHelp, isError, parseArgs } from "../src/args.js";

// Simulate process.argv: ["node", "edgeward", ...rest]
function parse(...rest: string[]) {
  return parseArgs(["node", "edgeward", ...rest]);
}

describe("parseArgs", () => {
  it("no args shows help", () => {
    assert.deepEqual(parse(), { command: "help", topic: null });
  });

  it("version flag", () => {
    assert.deepEqual(parse("--version"), { command: "version" });
    assert.deepEqual(parse("-v"), { command: "version" });
    assert.deepEqual(parse("version"), { command: "version" });
  });

  it("help with topic", () => {
    assert.deepEqual(parse("help", "route"), { command: "help", topic: "route" });
    assert.deepEqual(parse("--help"), { command: "help", topic: null });
  });

  it("unknown command is an error", () => {
    const r = parse("serve");
    assert.ok(isError(r));
    assert.ok(r.error.startsWith("Unknown command: serve\n"));
  });

  it("redact with no flags uses defaults", () => {
    assert.deepEqual(parse("redact"), {
      command: "redact",
      config: null,
      path: "/",
      contentType: null,
      chunkSize: 0,
    });
  });

  it("redact with all options", () => {
    assert.deepEqual(
      parse(
        "redact",
        "--config",
        "redact.json",
        "--path",
        "/api/users",
        "--content-type",
        "application/json",
        "--chunk-size",
        "64",
      ),
      {
        command: "redact",
        config: "redact.json",
        path: "/api/users",
        contentType: "application/json",
        chunkSize: 64,
      },
    );
  });

  it("redact rejects a bad chunk size", () => {
    assert.deepEqual(parse("redact", "--chunk-size", "-1"), {
      error: "Invalid value for --chunk-size: -1",
    });
    assert.deepEqual(parse("redact", "--chunk-size", "lots"), {
      error: "Invalid value for --chunk-size: lots",
    });
  });

  it("redact option missing its value", () => {
    assert.deepEqual(parse("redact", "--config"), { error: "--config requires a value" });
  });

  it("redact rejects unknown options", () => {
    const r = parse("redact", "--fast");
    assert.ok(isError(r));
    assert.ok(r.error.startsWith("Unknown option: --fast\n"));
  });

  it("redact --help shows redact help", () => {
    assert.deepEqual(parse("redact", "--help"), { command: "help", topic: "redact" });
  });

  it("route collects repeated headers in order", () => {
    assert.deepEqual(
      parse(
        "route",
        "--config",
        "routes.json",
        "--path",
        "/api?x=1",
        "-H",
        "X-Geo-Country: DE",
        "--header",
        "Cookie:beta-tester=true",
        "-H",
        "X-Empty:",
      ),
      {
        command: "route",
        config: "routes.json",
        path: "/api?x=1",
        headers: [
          ["X-Geo-Country", "DE"],
          ["Cookie", "beta-tester=true"],
          ["X-Empty", ""],
        ],
      },
    );
  });

  it("route keeps colons in header values", () => {
    const r = parse("route", "-H", "Referer: https://example.com:8443/x");
    assert.ok(!isError(r));
    if (r.command === "route") {
      assert.deepEqual(r.headers, [["Referer", "https://example.com:8443/x"]]);
    }
  });

  it("route rejects a header without a name", () => {
    assert.deepEqual(parse("route", "-H", ": value"), {
      error: 'Invalid header: : value (expected "Name: value")',
    });
    assert.deepEqual(parse("route", "-H", "novalue"), {
      error: 'Invalid header: novalue (expected "Name: value")',
    });
  });

  it("validate takes a kind and a file", () => {
    assert.deepEqual(parse("validate", "route", "routes.json"), {
      command: "validate",
      kind: "route",
      file: "routes.json",
    });
  });

  it("validate rejects a bad kind, a missing file and extra arguments", () => {
    const badKind = parse("validate", "proxy", "x.json");
    assert.ok(isError(badKind));
    assert.ok(badKind.error.startsWith("validate requires one of: redact, route"));

    const noFile = parse("validate", "redact");
    assert.ok(isError(noFile));
    assert.ok(noFile.error.startsWith("No config file specified"));

    const extra = parse("validate", "redact", "a.json", "b.json");
    assert.ok(isError(extra));
    assert.ok(extra.error.startsWith("Unexpected argument: b.json"));
  });
});

describe("getHelp", () => {
  it("returns command help by topic", () => {
    assert.ok(getHelp("redact").startsWith("edgeward redact [options] < body"));
    assert.ok(getHelp("route").startsWith("edgeward route [options]"));
    assert.ok(getHelp("validate").startsWith("edgeward validate <redact|route> <file>"));
  });

  it("falls back to the main help", () => {
    assert.ok(getHelp(null).startsWith("edgeward - edge HTTP traffic-policy filters"));
    assert.equal(getHelp("nonsense"), getHelp(null));
  });
});
