import { describe, it, expect } from "vitest";
import { decodeValue, encodeValue, formatFloat, MAX_NESTING_DEPTH } from "./ValueCodec.js";
import { bool, float, int, list, nil, pairs, qname, str, sym, tuple } from "../model/literal.js";
import { BadInputError, BadValueError, type Literal } from "../types/index.js";

function decoded(text: string): Literal {
  const result = decodeValue(text);
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

function failure(text: string): BadValueError {
  const result = decodeValue(text);
  if (result.ok) {
    throw new Error(`expected "${text}" to be rejected`);
  }
  return result.error;
}

describe("ValueCodec", () => {
  describe("encodeValue", () => {
    it("encodes scalars", () => {
      expect(encodeValue(int(0))).toBe("0");
      expect(encodeValue(int(-7))).toBe("-7");
      expect(encodeValue(bool(true))).toBe("true");
      expect(encodeValue(bool(false))).toBe("false");
      expect(encodeValue(nil())).toBe("nil");
    });

    it("keeps integers of any size", () => {
      expect(encodeValue(int(123456789012345678901234567890n))).toBe("123456789012345678901234567890");
    });

    it("always writes floats with a fraction", () => {
      expect(encodeValue(float(3.14))).toBe("3.14");
      expect(encodeValue(float(100))).toBe("100.0");
      expect(encodeValue(float(1e21))).toBe("1.0e+21");
      expect(encodeValue(float(1.5e-7))).toBe("1.5e-7");
      expect(encodeValue(float(-0))).toBe("-0.0");
    });

    it("quotes and escapes strings", () => {
      expect(encodeValue(str('hi"there'))).toBe('"hi\\"there"');
      expect(encodeValue(str("a\nb\\c"))).toBe('"a\\nb\\\\c"');
      expect(encodeValue(str("#{x} and #y"))).toBe('"\\#{x} and #y"');
      expect(encodeValue(str("\u0001\u007f"))).toBe('"\\u{1}\\u{7F}"');
      expect(encodeValue(str("héllo ☃"))).toBe('"héllo ☃"');
    });

    it("encodes symbols and qualified names", () => {
      expect(encodeValue(sym("sym"))).toBe(":sym");
      expect(encodeValue(sym("ready?"))).toBe(":ready?");
      expect(encodeValue(qname("Qualified.Name"))).toBe("Qualified.Name");
    });

    it("encodes collections", () => {
      expect(encodeValue(list())).toBe("[]");
      expect(encodeValue(list(int(1), list(int(2), int(3)), sym("four")))).toBe("[1, [2, 3], :four]");
      expect(encodeValue(pairs(["x", int(1)], ["y", str("two")]))).toBe('[x: 1, y: "two"]');
      expect(encodeValue(pairs(["MyApp.Repo", list(tuple(qname("Ecto.LogEntry"), sym("log"), list()))]))).toBe(
        "[MyApp.Repo: [{Ecto.LogEntry, :log, []}]]",
      );
      expect(encodeValue(tuple())).toBe("{}");
    });

    it("rejects values the grammar cannot express", () => {
      expect(() => encodeValue({ kind: "float", value: Number.NaN })).toThrow(BadInputError);
      expect(() => encodeValue({ kind: "float", value: Number.POSITIVE_INFINITY })).toThrow(BadInputError);
      expect(() => encodeValue({ kind: "symbol", name: "Upper" })).toThrow(BadInputError);
      expect(() => formatFloat(Number.NaN)).toThrow(BadInputError);
    });
  });

  describe("decodeValue", () => {
    it.each<[string, Literal]>([
      ["zero", int(0)],
      ["negative integer", int(-7)],
      ["float", float(3.14)],
      ["true", bool(true)],
      ["false", bool(false)],
      ["nil", nil()],
      ["escaped string", str('hi"there')],
      ["symbol", sym("sym")],
      ["qualified name", qname("Qualified.Name")],
      ["empty list", list()],
      ["pair list", pairs(["x", int(1)], ["y", str("two")])],
      ["nested list", list(int(1), list(int(2), int(3)), sym("four"))],
      ["tuple", tuple(sym("ok"), str("done"))],
      ["large float", float(1e21)],
      ["negative zero", float(-0)],
      ["control characters", str("tab\there\u0000\u001b")],
    ])("reads back an encoded %s", (_name, literal) => {
      expect(decodeValue(encodeValue(literal))).toEqual({ ok: true, value: literal });
    });

    it("parses integers with digit separators and leading zeros", () => {
      expect(decoded("1_000_000")).toEqual(int(1000000));
      expect(decoded("007")).toEqual(int(7));
      expect(decoded("-123456789012345678901234567890")).toEqual(int(-123456789012345678901234567890n));
    });

    it("parses floats with exponents", () => {
      expect(decoded("1.5e3")).toEqual(float(1500));
      expect(decoded("2.5E-2")).toEqual(float(0.025));
    });

    it("parses string escapes", () => {
      expect(decoded('"\\x41\\u0042\\u{1F600}"')).toEqual(str("AB\u{1F600}"));
      expect(decoded('"a\\sb\\#{c}"')).toEqual(str("a b#{c}"));
    });

    it("ignores whitespace between tokens", () => {
      expect(decoded(" [ 1 ,\n 2 ] ")).toEqual(list(int(1), int(2)));
      expect(decoded("[ host:  \"x\" ]")).toEqual(pairs(["host", str("x")]));
    });

    it("accepts keywords and qualified names as pair keys", () => {
      expect(decoded("[nil: 1, true: :yes, Some.Module: [a: 1]]")).toEqual(
        pairs(["nil", int(1)], ["true", sym("yes")], ["Some.Module", pairs(["a", int(1)])]),
      );
    });

    it("reads a symbol directly after a key separator", () => {
      expect(decoded("[a::b]")).toEqual(pairs(["a", sym("b")]));
    });

    it("rejects text outside the grammar", () => {
      for (const text of [
        "not(valid",
        "bogus value",
        "won't work",
        "foo",
        "Foo.bar",
        'System.cmd("rm")',
        "1..2",
        "1e5",
        "[1, 2",
        "[1,]",
        "[a: 1, 2]",
        "[1, a: 2]",
        "{1 2}",
        '"abc',
        '"#{x}"',
        '"\\q"',
        ":Foo",
        "%{a: 1}",
        "'chars'",
        "true: 1",
        "1 2",
        "1.0e999",
        "",
        "   ",
      ]) {
        const result = decodeValue(text);
        expect(result.ok, text).toBe(false);
        if (!result.ok) {
          expect(result.error).toBeInstanceOf(BadValueError);
          expect(result.error.code).toBe("BAD_VALUE");
        }
      }
    });

    it("reports where parsing failed", () => {
      const error = failure("not(valid");
      expect(error.position).toBe(3);
      expect(error.message).toBe("unexpected character '(' at position 3");
    });

    it("names the offending token", () => {
      expect(failure("[1, 2").message).toBe("expected ',' or ']', found end of input at position 5");
      expect(failure("bogus value").message).toBe("expected a value, found identifier 'bogus' at position 0");
    });

    it("limits nesting depth", () => {
      const deep = `${"[".repeat(MAX_NESTING_DEPTH + 10)}${"]".repeat(MAX_NESTING_DEPTH + 10)}`;
      expect(failure(deep).message).toContain("nested too deeply");

      const shallow = `${"[".repeat(50)}${"]".repeat(50)}`;
      expect(decodeValue(shallow).ok).toBe(true);
    });
  });
});
