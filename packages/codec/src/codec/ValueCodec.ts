/**
 * ValueCodec - literal values to and from their textual form
 *
 * Decoding runs a tokenizer and a recursive-descent parser over a closed
 * grammar: numbers, booleans, `nil`, strings, symbols, qualified names,
 * lists, `key: value` lists and tuples. Nothing in the text is ever executed.
 */

import {
  BadInputError,
  BadValueError,
  type DecodeResult,
  type Identifier,
  type Literal,
  type LiteralPair,
} from "../types/index.js";
import { identifierText, isValidIdentifier } from "../model/identifier.js";

export type ValueDecodeResult = DecodeResult<Literal, BadValueError>;

export const MAX_NESTING_DEPTH = 256;

type Punctuation = "[" | "]" | "{" | "}" | "," | ":";

type Token =
  | { type: "integer"; value: bigint; position: number }
  | { type: "float"; value: number; position: number }
  | { type: "string"; value: string; position: number }
  | { type: "symbol"; name: string; position: number }
  | { type: "word"; text: string; position: number }
  | { type: "qualified"; segments: string[]; position: number }
  | { type: "punct"; text: Punctuation; position: number };

const KEYWORDS = new Map<string, Literal>([
  ["true", { kind: "boolean", value: true }],
  ["false", { kind: "boolean", value: false }],
  ["nil", { kind: "null" }],
]);

const SIMPLE_ESCAPES = new Map<string, string>([
  ['"', '"'],
  ["\\", "\\"],
  ["#", "#"],
  ["n", "\n"],
  ["t", "\t"],
  ["r", "\r"],
  ["f", "\f"],
  ["b", "\b"],
  ["v", "\v"],
  ["e", "\u001b"],
  ["a", "\u0007"],
  ["s", " "],
  ["0", "\0"],
]);

const ENCODE_ESCAPES = new Map<string, string>([
  ['"', '\\"'],
  ["\\", "\\\\"],
  ["\n", "\\n"],
  ["\t", "\\t"],
  ["\r", "\\r"],
  ["\f", "\\f"],
  ["\b", "\\b"],
  ["\v", "\\v"],
  ["\u001b", "\\e"],
  ["\u0007", "\\a"],
  ["\0", "\\0"],
]);

const DIGITS = /\d+(?:_\d+)*/y;
const NAME_TAIL = /[A-Za-z0-9_@]*[?!]?/y;
const QUALIFIED_SEGMENT = /[A-Z][A-Za-z0-9_]*/y;
const HEX_BYTE = /[0-9A-Fa-f]{1,2}/y;
const HEX_UNIT = /[0-9A-Fa-f]{4}/y;
const HEX_CODE_POINT = /([0-9A-Fa-f]{1,6})\}/y;

function matchAt(pattern: RegExp, text: string, index: number): RegExpExecArray | null {
  pattern.lastIndex = index;
  return pattern.exec(text);
}

function isPunctuation(char: string): char is Punctuation {
  return char.length === 1 && "[]{},:".includes(char);
}

// ============================================================================
// Encoding
// ============================================================================

export function encodeValue(literal: Literal): string {
  switch (literal.kind) {
    case "integer":
      return literal.value.toString();
    case "float":
      return formatFloat(literal.value);
    case "boolean":
      return literal.value ? "true" : "false";
    case "null":
      return "nil";
    case "string":
      return quoteString(literal.value);
    case "symbol":
      return `:${checkedText(literal)}`;
    case "qualified":
      return checkedText(literal);
    case "list":
      return `[${literal.items.map((item) => encodeValue(item)).join(", ")}]`;
    case "pairs":
      return `[${literal.entries.map((entry) => `${checkedText(entry.key)}: ${encodeValue(entry.value)}`).join(", ")}]`;
    case "tuple":
      return `{${literal.items.map((item) => encodeValue(item)).join(", ")}}`;
  }
}

function checkedText(id: Identifier): string {
  if (!isValidIdentifier(id)) {
    throw new BadInputError(`"${identifierText(id)}" is not a valid ${id.kind === "symbol" ? "symbol" : "qualified name"}`);
  }
  return identifierText(id);
}

/** Shortest round-trip form, always with a fraction so it reads back as a float. */
export function formatFloat(value: number): string {
  if (!Number.isFinite(value)) {
    throw new BadInputError(`${value} cannot be encoded as a float`);
  }
  if (Object.is(value, -0)) {
    return "-0.0";
  }
  const text = String(value);
  const exponentAt = text.indexOf("e");
  if (exponentAt === -1) {
    return text.includes(".") ? text : `${text}.0`;
  }
  const mantissa = text.slice(0, exponentAt);
  return `${mantissa.includes(".") ? mantissa : `${mantissa}.0`}${text.slice(exponentAt)}`;
}

export function quoteString(value: string): string {
  let quoted = '"';
  for (let i = 0; i < value.length; i++) {
    const char = value[i];
    const escaped = ENCODE_ESCAPES.get(char);
    if (escaped !== undefined) {
      quoted += escaped;
    } else if (char === "#" && value[i + 1] === "{") {
      quoted += "\\#";
    } else {
      const code = char.charCodeAt(0);
      quoted += code < 0x20 || code === 0x7f ? `\\u{${code.toString(16).toUpperCase()}}` : char;
    }
  }
  return `${quoted}"`;
}

// ============================================================================
// Decoding
// ============================================================================

export function decodeValue(text: string): ValueDecodeResult {
  try {
    return { ok: true, value: parseLiteral(text) };
  } catch (error) {
    if (error instanceof BadValueError) {
      return { ok: false, error };
    }
    throw error;
  }
}

/**
 * Parse a single literal, throwing BadValueError when the text falls
 * outside the grammar.
 */
export function parseLiteral(text: string): Literal {
  const tokens = tokenize(text);
  if (tokens.length === 0) {
    throw new BadValueError("empty value");
  }

  let pos = 0;
  const peek = (offset = 0): Token | undefined => tokens[pos + offset];
  const consume = (): Token => tokens[pos++];

  const isPunct = (token: Token | undefined, punct: Punctuation): boolean =>
    token?.type === "punct" && token.text === punct;

  const isPairStart = (): boolean => {
    const token = peek();
    return (token?.type === "word" || token?.type === "qualified") && isPunct(peek(1), ":");
  };

  const fail = (message: string, token: Token | undefined): never => {
    throw new BadValueError(
      token ? `${message}, found ${describeToken(token)}` : `${message}, found end of input`,
      token?.position ?? text.length,
    );
  };

  const parseValue = (depth: number): Literal => {
    if (depth > MAX_NESTING_DEPTH) {
      throw new BadValueError("value is nested too deeply", peek()?.position);
    }
    const token = peek();
    if (!token) {
      return fail("expected a value", token);
    }
    switch (token.type) {
      case "integer":
        consume();
        return { kind: "integer", value: token.value };
      case "float":
        consume();
        return { kind: "float", value: token.value };
      case "string":
        consume();
        return { kind: "string", value: token.value };
      case "symbol":
        consume();
        return { kind: "symbol", name: token.name };
      case "qualified":
        consume();
        return { kind: "qualified", segments: token.segments };
      case "word": {
        const keyword = KEYWORDS.get(token.text);
        if (!keyword) {
          return fail("expected a value", token);
        }
        consume();
        return keyword;
      }
      case "punct":
        if (token.text === "[") {
          return parseList(depth + 1);
        }
        if (token.text === "{") {
          return parseTuple(depth + 1);
        }
        return fail("expected a value", token);
    }
  };

  const parsePair = (depth: number): LiteralPair => {
    const token = consume();
    let key: Identifier;
    if (token.type === "word") {
      key = { kind: "symbol", name: token.text };
    } else if (token.type === "qualified") {
      key = { kind: "qualified", segments: token.segments };
    } else {
      return fail("expected a key", token);
    }
    consume();
    return { key, value: parseValue(depth) };
  };

  const parseList = (depth: number): Literal => {
    consume();
    if (isPunct(peek(), "]")) {
      consume();
      return { kind: "list", items: [] };
    }
    const pairMode = isPairStart();
    const items: Literal[] = [];
    const entries: LiteralPair[] = [];
    for (;;) {
      if (pairMode) {
        if (!isPairStart()) {
          fail("expected a key: value pair", peek());
        }
        entries.push(parsePair(depth));
      } else {
        if (isPairStart()) {
          fail("cannot mix key: value pairs with plain values", peek());
        }
        items.push(parseValue(depth));
      }
      const next = peek();
      if (isPunct(next, ",")) {
        consume();
        continue;
      }
      if (isPunct(next, "]")) {
        consume();
        break;
      }
      fail("expected ',' or ']'", next);
    }
    return pairMode ? { kind: "pairs", entries } : { kind: "list", items };
  };

  const parseTuple = (depth: number): Literal => {
    consume();
    const items: Literal[] = [];
    if (isPunct(peek(), "}")) {
      consume();
      return { kind: "tuple", items };
    }
    for (;;) {
      items.push(parseValue(depth));
      const next = peek();
      if (isPunct(next, ",")) {
        consume();
        continue;
      }
      if (isPunct(next, "}")) {
        consume();
        break;
      }
      fail("expected ',' or '}'", next);
    }
    return { kind: "tuple", items };
  };

  const result = parseValue(0);
  if (pos < tokens.length) {
    fail("unexpected input after value", peek());
  }
  return result;
}

function describeToken(token: Token): string {
  switch (token.type) {
    case "punct":
      return `'${token.text}'`;
    case "word":
      return `identifier '${token.text}'`;
    case "qualified":
      return `'${token.segments.join(".")}'`;
    case "symbol":
      return `':${token.name}'`;
    default:
      return token.type;
  }
}

function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < text.length) {
    const char = text[i];

    if (/\s/.test(char)) {
      i++;
      continue;
    }

    // `:name` is a symbol, a bare `:` separates a key from its value
    if (char === ":" && /[a-z_]/.test(text[i + 1] ?? "")) {
      const tail = matchAt(NAME_TAIL, text, i + 2);
      const end = i + 2 + (tail?.[0].length ?? 0);
      tokens.push({ type: "symbol", name: text.slice(i + 1, end), position: i });
      i = end;
      continue;
    }

    if (isPunctuation(char)) {
      tokens.push({ type: "punct", text: char, position: i });
      i++;
      continue;
    }

    if (char === '"') {
      const { value, end } = readString(text, i);
      tokens.push({ type: "string", value, position: i });
      i = end;
      continue;
    }

    if (/\d/.test(char) || (char === "-" && /\d/.test(text[i + 1] ?? ""))) {
      const { token, end } = readNumber(text, i);
      tokens.push(token);
      i = end;
      continue;
    }

    if (/[a-z_]/.test(char)) {
      const tail = matchAt(NAME_TAIL, text, i + 1);
      const end = i + 1 + (tail?.[0].length ?? 0);
      tokens.push({ type: "word", text: text.slice(i, end), position: i });
      i = end;
      continue;
    }

    if (/[A-Z]/.test(char)) {
      const segments: string[] = [];
      let end = i;
      for (;;) {
        const segment = matchAt(QUALIFIED_SEGMENT, text, end);
        if (!segment) {
          break;
        }
        segments.push(segment[0]);
        end += segment[0].length;
        if (text[end] !== "." || !/[A-Z]/.test(text[end + 1] ?? "")) {
          break;
        }
        end++;
      }
      tokens.push({ type: "qualified", segments, position: i });
      i = end;
      continue;
    }

    throw new BadValueError(`unexpected character '${char}'`, i);
  }

  return tokens;
}

function readNumber(text: string, start: number): { token: Token; end: number } {
  let i = start;
  if (text[i] === "-") {
    i++;
  }
  i += readDigits(text, i);

  let isFloat = false;
  if (text[i] === "." && /\d/.test(text[i + 1] ?? "")) {
    isFloat = true;
    i += 1 + readDigits(text, i + 1);
    if (text[i] === "e" || text[i] === "E") {
      let j = i + 1;
      if (text[j] === "+" || text[j] === "-") {
        j++;
      }
      if (!/\d/.test(text[j] ?? "")) {
        throw new BadValueError("expected digits in exponent", j);
      }
      while (/\d/.test(text[j] ?? "")) {
        j++;
      }
      i = j;
    }
  }

  if (/[A-Za-z0-9_@.]/.test(text[i] ?? "")) {
    throw new BadValueError("malformed number", start);
  }

  const raw = text.slice(start, i).replaceAll("_", "");
  if (!isFloat) {
    return { token: { type: "integer", value: BigInt(raw), position: start }, end: i };
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new BadValueError("float out of range", start);
  }
  return { token: { type: "float", value, position: start }, end: i };
}

function readDigits(text: string, index: number): number {
  const match = matchAt(DIGITS, text, index);
  if (!match) {
    throw new BadValueError("expected digits", index);
  }
  return match[0].length;
}

function readString(text: string, start: number): { value: string; end: number } {
  let value = "";
  let i = start + 1;
  while (i < text.length) {
    const char = text[i];
    if (char === '"') {
      return { value, end: i + 1 };
    }
    if (char === "\\") {
      const { decoded, next } = readEscape(text, i);
      value += decoded;
      i = next;
      continue;
    }
    if (char === "#" && text[i + 1] === "{") {
      throw new BadValueError("string interpolation is not supported", i);
    }
    value += char;
    i++;
  }
  throw new BadValueError("unterminated string", start);
}

function readEscape(text: string, index: number): { decoded: string; next: number } {
  const marker = text[index + 1];
  if (marker === undefined) {
    throw new BadValueError("unterminated string", index);
  }
  const simple = SIMPLE_ESCAPES.get(marker);
  if (simple !== undefined) {
    return { decoded: simple, next: index + 2 };
  }
  if (marker === "x") {
    const hex = matchAt(HEX_BYTE, text, index + 2);
    if (hex) {
      return { decoded: String.fromCharCode(parseInt(hex[0], 16)), next: index + 2 + hex[0].length };
    }
  }
  if (marker === "u") {
    if (text[index + 2] === "{") {
      const braced = matchAt(HEX_CODE_POINT, text, index + 3);
      const codePoint = braced ? parseInt(braced[1], 16) : Number.NaN;
      if (braced && codePoint <= 0x10ffff) {
        return { decoded: String.fromCodePoint(codePoint), next: index + 3 + braced[0].length };
      }
    } else {
      const unit = matchAt(HEX_UNIT, text, index + 2);
      if (unit) {
        return { decoded: String.fromCharCode(parseInt(unit[0], 16)), next: index + 6 };
      }
    }
  }
  throw new BadValueError(`invalid escape sequence '\\${marker}'`, index);
}
