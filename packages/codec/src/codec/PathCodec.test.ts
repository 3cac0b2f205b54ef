import { describe, it, expect } from "vitest";
import { decodePath, encodePath, resolveNamespace } from "./PathCodec.js";
import { qname, sym } from "../model/literal.js";
import { BadInputError, BadKeyError } from "../types/index.js";

describe("PathCodec", () => {
  describe("encodePath", () => {
    it("joins the namespace and segments with hyphens", () => {
      expect(encodePath([sym("api"), qname("Api.Repo"), sym("priv")], { namespace: "tag" })).toBe(
        "tag-api-Api.Repo-priv",
      );
    });

    it("uses the default namespace", () => {
      expect(encodePath([sym("my_app"), sym("key")])).toBe("cfg-my_app-key");
    });

    it("rejects an empty segment list", () => {
      expect(() => encodePath([], { namespace: "tag" })).toThrow(BadInputError);
    });

    it("rejects segments that are not identifiers", () => {
      expect(() => encodePath([{ kind: "symbol", name: "has-hyphen" }])).toThrow(BadInputError);
      expect(() => encodePath([{ kind: "qualified", segments: [] }])).toThrow(BadInputError);
    });
  });

  describe("decodePath", () => {
    it("splits the key into app and path, classifying each piece", () => {
      const result = decodePath("tag-api-Api.Repo-priv", { namespace: "tag" });
      expect(result).toEqual({
        ok: true,
        value: {
          app: { kind: "symbol", name: "api" },
          path: [
            { kind: "qualified", segments: ["Api", "Repo"] },
            { kind: "symbol", name: "priv" },
          ],
        },
      });
    });

    it("accepts an app-only key", () => {
      const result = decodePath("tag-logger", { namespace: "tag" });
      expect(result).toEqual({ ok: true, value: { app: { kind: "symbol", name: "logger" }, path: [] } });
    });

    it("treats underscore-leading pieces as symbols", () => {
      const result = decodePath("tag-app-_private", { namespace: "tag" });
      expect(result.ok && result.value.path).toEqual([{ kind: "symbol", name: "_private" }]);
    });

    it("rejects keys without the namespace prefix", () => {
      for (const key of ["bad key", "tagx-app-key", "tag", "other-app-key"]) {
        const result = decodePath(key, { namespace: "tag" });
        expect(result.ok).toBe(false);
        if (!result.ok) {
          expect(result.error).toBeInstanceOf(BadKeyError);
          expect(result.error.code).toBe("BAD_KEY");
        }
      }
    });

    it("rejects empty path segments", () => {
      for (const key of ["tag-", "tag-app--key", "tag-app-", "tag--app"]) {
        const result = decodePath(key, { namespace: "tag" });
        expect(result.ok).toBe(false);
        if (!result.ok) {
          expect(result.error.message).toBe(`key "${key}" contains an empty path segment`);
        }
      }
    });

    it("rejects pieces that are not identifiers", () => {
      const result = decodePath("tag-app-Foo.bar", { namespace: "tag" });
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('key "tag-app-Foo.bar" has an invalid path segment "Foo.bar"');
      }
      expect(decodePath("tag-app-foo bar", { namespace: "tag" }).ok).toBe(false);
    });

    it("reverses encodePath", () => {
      const segments = [sym("my_app"), qname("MyApp.Endpoint"), sym("url"), sym("host")];
      const result = decodePath(encodePath(segments));
      expect(result).toEqual({ ok: true, value: { app: segments[0], path: segments.slice(1) } });
    });
  });

  describe("resolveNamespace", () => {
    it("rejects namespaces containing the separator", () => {
      expect(() => resolveNamespace({ namespace: "my-tag" })).toThrow(BadInputError);
      expect(() => resolveNamespace({ namespace: "" })).toThrow(BadInputError);
    });

    it("accepts dotted namespaces", () => {
      expect(resolveNamespace({ namespace: "acme.prod" })).toBe("acme.prod");
    });
  });
});
