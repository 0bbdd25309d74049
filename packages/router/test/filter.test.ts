import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { ConfigError, applyMutations } from "@edgeward/core";

import { parseRoutingConfig } from "../src/config.js";
import { createRouterFilter, routeRequest } from "../src/index.js";

const document = {
  default_target: "v1",
  path_rewrites: { v2: "/v2" },
  rules: [
    {
      name: "beta-testers",
      priority: 1,
      conditions: [
        { type: "header", key: "User-Agent", operator: "contains", value: "iPhone" },
        { type: "header", key: "X-Geo-Country", operator: "equals", value: "DE" },
        { type: "cookie", key: "beta-tester", operator: "equals", value: "true" },
      ],
      target: "v2",
      add_headers: { "X-Canary": "true", "x-routed-by": "spoofed" },
      remove_headers: ["X-Debug"],
    },
  ],
};

const betaHeaders = {
  "User-Agent": "Mozilla/5.0 (iPhone; CPU iPhone OS 17_0 like Mac OS X)",
  "X-Geo-Country": "DE",
  Cookie: "session=abc123; beta-tester=true",
  "X-Debug": "1",
};

describe("routeRequest", () => {
  const config = parseRoutingConfig(document);

  it("turns a matching rule into header mutations and a path rewrite", () => {
    const { decision, mutations } = routeRequest(config, {
      path: "/api/items?page=2",
      headers: betaHeaders,
    });
    assert.equal(decision.matchedRule, "beta-testers");
    assert.deepEqual(mutations, {
      add: {
        "X-Canary": "true",
        "X-Routed-By": "edgeward-router",
        "X-Route-Reason": "beta-testers",
      },
      remove: ["X-Debug"],
      target: "v2",
      path: "/v2/api/items?page=2",
    });
  });

  it("does not prefix a path that already carries the prefix", () => {
    const { mutations } = routeRequest(config, { path: "/v2/api/items", headers: betaHeaders });
    assert.equal(mutations.path, undefined);
  });

  it("marks default routing", () => {
    const { mutations } = routeRequest(config, {
      path: "/api/items",
      headers: { ...betaHeaders, "X-Geo-Country": "US" },
    });
    assert.deepEqual(mutations, {
      add: { "X-Routed-By": "edgeward-router", "X-Route-Reason": "default" },
      remove: [],
      target: "v1",
    });
  });

  it("ignores rewrite lookups for inherited property names", () => {
    const odd = parseRoutingConfig({ default_target: "constructor" });
    const { mutations } = routeRequest(odd, { path: "/", headers: {} });
    assert.equal(mutations.target, "constructor");
    assert.equal(mutations.path, undefined);
  });

  it("produces headers a host can apply directly", () => {
    const { mutations } = routeRequest(config, { path: "/", headers: betaHeaders });
    assert.deepEqual(applyMutations(betaHeaders, mutations), {
      "User-Agent": betaHeaders["User-Agent"],
      "X-Geo-Country": "DE",
      Cookie: "session=abc123; beta-tester=true",
      "X-Canary": "true",
      "X-Routed-By": "edgeward-router",
      "X-Route-Reason": "beta-testers",
    });
  });
});

describe("createRouterFilter", () => {
  function setup(config: unknown = document) {
    const lines: string[] = [];
    const filter = createRouterFilter({ config, logSink: (l) => lines.push(l) });
    return { filter, lines };
  }

  it("logs its configuration", () => {
    const { lines } = setup();
    assert.deepEqual(lines, [
      "[router] Configured with 1 rule(s), default_target=v1, cookie conditions present",
    ]);
  });

  it("logs without the cookie note when no rule reads cookies", () => {
    const { lines } = setup({});
    assert.deepEqual(lines, ["[router] Configured with 0 rule(s), default_target=v1"]);
  });

  it("throws ConfigError for a malformed config", () => {
    assert.throws(() => setup({ rules: [{ name: "x" }] }), ConfigError);
  });

  it("decides on request headers and logs the decision", () => {
    const { filter, lines } = setup();
    const ctx = filter.createContext();
    const mutations = ctx.onRequestHeaders?.({ path: "/api", method: "GET", headers: betaHeaders });
    assert.equal(mutations?.target, "v2");
    assert.equal(mutations?.path, "/v2/api");
    assert.deepEqual(lines.slice(1), [
      "[router] [1] Routing decision: target=v2 reason=beta-testers",
      "[router] [1] Rewrote path from /api to /v2/api",
    ]);
  });

  it("shares one compiled rule set across contexts", () => {
    const { filter, lines } = setup();
    filter.createContext().onRequestHeaders?.({ path: "/", headers: {} });
    filter.createContext().onRequestHeaders?.({ path: "/", headers: betaHeaders });
    assert.deepEqual(lines.slice(1, 2), ["[router] [1] Routing decision: target=v1 reason=default"]);
    assert.equal(lines[2], "[router] [2] Routing decision: target=v2 reason=beta-testers");
  });

  it("marks responses as routed and has no body hooks", () => {
    const { filter } = setup();
    const ctx = filter.createContext();
    assert.deepEqual(
      ctx.onResponseHeaders?.({ status: 200, headers: { "content-type": "text/plain" } }),
      { add: { "X-Edgeward-Router": "active" }, remove: [] },
    );
    assert.equal(ctx.onResponseBody, undefined);
  });
});
