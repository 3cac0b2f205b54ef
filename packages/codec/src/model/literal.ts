/**
 * Builders for literals and config trees.
 *
 * @example
 * ```typescript
 * const tree = [
 *   app("my_app",
 *     option("pool_size", int(10)),
 *     option("MyApp.Endpoint", group(option("host", str("localhost")))),
 *   ),
 * ];
 * ```
 */

import {
  BadInputError,
  type AppConfig,
  type BooleanLiteral,
  type FloatLiteral,
  type Identifier,
  type IntegerLiteral,
  type LeafValue,
  type ListLiteral,
  type Literal,
  type NestedValue,
  type NullLiteral,
  type OptionEntry,
  type OptionValue,
  type PairsLiteral,
  type StringLiteral,
  type TupleLiteral,
} from "../types/index.js";
import { identifier } from "./identifier.js";

export { identifier, qname, sym } from "./identifier.js";

export function int(value: number | bigint): IntegerLiteral {
  if (typeof value === "number" && !Number.isSafeInteger(value)) {
    throw new BadInputError(`${value} is not a safe integer; pass a bigint instead`);
  }
  return { kind: "integer", value: BigInt(value) };
}

export function float(value: number): FloatLiteral {
  if (!Number.isFinite(value)) {
    throw new BadInputError(`${value} is not a finite float`);
  }
  return { kind: "float", value };
}

export function bool(value: boolean): BooleanLiteral {
  return { kind: "boolean", value };
}

export function nil(): NullLiteral {
  return { kind: "null" };
}

export function str(value: string): StringLiteral {
  return { kind: "string", value };
}

export function list(...items: Literal[]): ListLiteral {
  return { kind: "list", items };
}

export function tuple(...items: Literal[]): TupleLiteral {
  return { kind: "tuple", items };
}

export function pairs(...entries: Array<[Identifier | string, Literal]>): PairsLiteral {
  return {
    kind: "pairs",
    entries: entries.map(([key, value]) => ({ key: toIdentifier(key), value })),
  };
}

export function leaf(literal: Literal): LeafValue {
  return { kind: "leaf", literal };
}

export function group(...options: OptionEntry[]): NestedValue {
  return { kind: "nested", options };
}

export function option(key: Identifier | string, value: Literal | OptionValue): OptionEntry {
  return { key: toIdentifier(key), value: isOptionValue(value) ? value : leaf(value) };
}

export function app(name: Identifier | string, ...options: OptionEntry[]): AppConfig {
  return { app: toIdentifier(name), options };
}

function isOptionValue(value: Literal | OptionValue): value is OptionValue {
  return value.kind === "leaf" || value.kind === "nested";
}

function toIdentifier(key: Identifier | string): Identifier {
  return typeof key === "string" ? identifier(key) : key;
}
