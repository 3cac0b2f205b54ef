import { describe, it, expect } from "vitest";
import { flatten } from "./TreeFlattener.js";
import { app, bool, group, int, option, pairs, str, sym } from "../model/literal.js";
import { BadInputError } from "../types/index.js";

describe("flatten", () => {
  it("emits one pair per leaf", () => {
    expect(flatten([app("app", option("key", sym("value")))], { namespace: "tag" })).toEqual({
      "tag-app-key": ":value",
    });
  });

  it("extends the path through nested groups", () => {
    const tree = [
      app(
        "my_app",
        option("MyApp.Endpoint", group(option("url", group(option("host", str("localhost")), option("port", int(4444)))))),
      ),
      app("logger", option("level", sym("info"))),
    ];

    expect(flatten(tree, { namespace: "tag" })).toEqual({
      "tag-my_app-MyApp.Endpoint-url-host": '"localhost"',
      "tag-my_app-MyApp.Endpoint-url-port": "4444",
      "tag-logger-level": ":info",
    });
  });

  it("keeps a key: value literal under a single key", () => {
    const tree = [app("app", option("kwlist", pairs(["yes", bool(true)], ["no", bool(false)])))];

    expect(flatten(tree, { namespace: "tag" })).toEqual({ "tag-app-kwlist": "[yes: true, no: false]" });
  });

  it("writes an empty group as an empty list", () => {
    expect(flatten([app("app", option("extra", group()))], { namespace: "tag" })).toEqual({ "tag-app-extra": "[]" });
  });

  it("lets the last duplicate win", () => {
    const tree = [app("app", option("k", int(1))), app("app", option("k", int(2)))];

    expect(flatten(tree, { namespace: "tag" })).toEqual({ "tag-app-k": "2" });
  });

  it("returns an empty map for an empty tree", () => {
    expect(flatten([])).toEqual({});
  });

  it("rejects input that is not keyed by app", () => {
    const inputs: unknown[] = [
      [1, 2, 3],
      "blorp",
      22 / 7,
      {},
      null,
      [{ app: sym("a"), options: [{ key: sym("b"), value: sym("c") }] }],
      [{ app: { kind: "symbol", name: "Bad" }, options: [] }],
    ];
    for (const input of inputs) {
      expect(() => flatten(input, { namespace: "tag" })).toThrow(BadInputError);
    }
  });

  it("describes what was wrong with the input", () => {
    expect(() => flatten("blorp")).toThrow(/^expected a config tree keyed by app \(/);
  });
});
