/**
 * TreeMerger - deep merge of option lists
 *
 * Nested groups present on both sides merge key by key. A leaf holding a
 * `key: value` list with distinct keys counts as a group when it meets one.
 * In every other case the incoming value replaces the existing one. Keys keep
 * the position they were first seen at. Inputs are never mutated.
 */

import type { ConfigTree, Identifier, NestedValue, OptionEntry, OptionList, OptionValue } from "../types/index.js";
import { identifierText } from "../model/identifier.js";

export function mergeValues(existing: OptionValue, incoming: OptionValue): OptionValue {
  if (existing.kind === "leaf" && incoming.kind === "leaf") {
    return incoming;
  }
  const base = asGroup(existing);
  const next = asGroup(incoming);
  if (!base || !next) {
    return incoming;
  }
  return { kind: "nested", options: mergeOptions(base.options, next.options) };
}

/** The value as a nested group, lifting a leaf `key: value` list with distinct keys. */
export function asGroup(value: OptionValue): NestedValue | undefined {
  if (value.kind === "nested") {
    return value;
  }
  const { literal } = value;
  if (literal.kind !== "pairs" || literal.entries.length === 0) {
    return undefined;
  }
  const keys = new Set(literal.entries.map((entry) => identifierText(entry.key)));
  if (keys.size !== literal.entries.length) {
    return undefined;
  }
  return {
    kind: "nested",
    options: literal.entries.map((entry): OptionEntry => ({ key: entry.key, value: { kind: "leaf", literal: entry.value } })),
  };
}

export function mergeOptions(base: OptionList, incoming: OptionList): OptionList {
  const merged: OptionEntry[] = [...base];
  const indexByKey = new Map<string, number>();
  merged.forEach((entry, index) => indexByKey.set(identifierText(entry.key), index));

  for (const entry of incoming) {
    const id = identifierText(entry.key);
    const index = indexByKey.get(id);
    if (index === undefined) {
      indexByKey.set(id, merged.length);
      merged.push(entry);
      continue;
    }
    const current = merged[index];
    merged[index] = { key: current.key, value: mergeValues(current.value, entry.value) };
  }

  return merged;
}

export function mergeApp(tree: ConfigTree, app: Identifier, options: OptionList): ConfigTree {
  const id = identifierText(app);
  const index = tree.findIndex((entry) => identifierText(entry.app) === id);
  if (index === -1) {
    return [...tree, { app, options }];
  }
  return tree.map((entry, i) => (i === index ? { app: entry.app, options: mergeOptions(entry.options, options) } : entry));
}

/** Left fold of `mergeApp`; later trees win on colliding leaves. */
export function mergeTrees(...trees: ConfigTree[]): ConfigTree {
  return trees.reduce<ConfigTree>(
    (acc, tree) => tree.reduce<ConfigTree>((inner, entry) => mergeApp(inner, entry.app, entry.options), acc),
    [],
  );
}
