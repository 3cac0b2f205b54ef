import type { ConfigTree, Identifier, Literal, LiteralPair, OptionList, OptionValue } from "../types/index.js";
import { identifierText } from "./identifier.js";

export function identifiersEqual(a: Identifier, b: Identifier): boolean {
  return a.kind === b.kind && identifierText(a) === identifierText(b);
}

/** Structural equality; list, tuple and pair order is significant. */
export function literalsEqual(a: Literal, b: Literal): boolean {
  switch (a.kind) {
    case "integer":
      return b.kind === "integer" && a.value === b.value;
    case "float":
      return b.kind === "float" && Object.is(a.value, b.value);
    case "boolean":
      return b.kind === "boolean" && a.value === b.value;
    case "string":
      return b.kind === "string" && a.value === b.value;
    case "null":
      return b.kind === "null";
    case "symbol":
    case "qualified":
      return (b.kind === "symbol" || b.kind === "qualified") && identifiersEqual(a, b);
    case "list":
    case "tuple":
      return (
        (b.kind === "list" || b.kind === "tuple") &&
        b.kind === a.kind &&
        itemsEqual(a.items, b.items)
      );
    case "pairs":
      return b.kind === "pairs" && pairsEqual(a.entries, b.entries);
  }
}

function itemsEqual(a: readonly Literal[], b: readonly Literal[]): boolean {
  return a.length === b.length && a.every((item, index) => literalsEqual(item, b[index]));
}

function pairsEqual(a: readonly LiteralPair[], b: readonly LiteralPair[]): boolean {
  return (
    a.length === b.length &&
    a.every((entry, index) => identifiersEqual(entry.key, b[index].key) && literalsEqual(entry.value, b[index].value))
  );
}

function optionValuesEqual(a: OptionValue, b: OptionValue): boolean {
  if (a.kind === "leaf") {
    return b.kind === "leaf" && literalsEqual(a.literal, b.literal);
  }
  return b.kind === "nested" && optionListsEqual(a.options, b.options);
}

/** Key-wise comparison; entry order is ignored. */
export function optionListsEqual(a: OptionList, b: OptionList): boolean {
  const byKey = new Map(b.map((entry) => [identifierText(entry.key), entry.value]));
  if (byKey.size !== b.length || a.length !== b.length) {
    return false;
  }
  return a.every((entry) => {
    const other = byKey.get(identifierText(entry.key));
    return other !== undefined && optionValuesEqual(entry.value, other);
  });
}

/** Compares two trees by app and key, ignoring the order of both. */
export function treesEqual(a: ConfigTree, b: ConfigTree): boolean {
  const byApp = new Map(b.map((entry) => [identifierText(entry.app), entry.options]));
  if (byApp.size !== b.length || a.length !== b.length) {
    return false;
  }
  return a.every((entry) => {
    const other = byApp.get(identifierText(entry.app));
    return other !== undefined && optionListsEqual(entry.options, other);
  });
}
