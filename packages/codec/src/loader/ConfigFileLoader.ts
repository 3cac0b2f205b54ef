/**
 * ConfigFileLoader - build a config tree from a file on disk
 *
 * `.yaml` / `.yml` files hold a mapping of app name to options; mappings
 * become nested groups. Any other file holds a single literal expression,
 * a `key: value` list of apps such as
 *
 *     [my_app: [pool_size: 10, MyApp.Endpoint: [host: "localhost"]], logger: [level: :info]]
 *
 * where every non-empty `key: value` list with distinct keys becomes a nested
 * group. Files are read as they are: there are no includes or directives.
 */

import fsPromises from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import {
  BadInputError,
  BadValueError,
  LoadError,
  type ConfigTree,
  type EncodedConfigMap,
  type Identifier,
  type Literal,
  type LiteralPair,
  type OptionEntry,
  type OptionList,
  type PairsLiteral,
} from "../types/index.js";
import { identifierText, parseIdentifier } from "../model/identifier.js";
import { parseLiteral } from "../codec/ValueCodec.js";
import { flatten } from "../tree/TreeFlattener.js";
import { type CodecSettings, loadCodecSettings } from "../config/settings.js";
import { appLogger } from "../observability/logger.js";

const YAML_EXTENSIONS = new Set([".yaml", ".yml"]);

export async function loadConfigFile(filePath: string): Promise<ConfigTree> {
  let content: string;
  try {
    content = await fsPromises.readFile(filePath, "utf-8");
  } catch (error) {
    throw new LoadError(`Failed to read config file ${filePath}`, asError(error));
  }

  const tree = YAML_EXTENSIONS.has(path.extname(filePath).toLowerCase())
    ? treeFromYaml(content)
    : treeFromExpression(content);

  appLogger.debug(
    { file: filePath, apps: tree.length, event: "config_loader.loaded" },
    "Config file loaded",
  );
  return tree;
}

export async function encodeFile(
  filePath: string,
  settings: Partial<CodecSettings> = {},
): Promise<EncodedConfigMap> {
  const { namespace } = loadCodecSettings(settings);
  return flatten(await loadConfigFile(filePath), { namespace });
}

// ============================================================================
// Literal expression files
// ============================================================================

export function treeFromExpression(content: string): ConfigTree {
  let literal: Literal;
  try {
    literal = parseLiteral(content);
  } catch (error) {
    if (error instanceof BadValueError) {
      throw new BadInputError(`config file is not a valid literal expression: ${error.message}`);
    }
    throw error;
  }
  return treeFromLiteral(literal);
}

/**
 * Turn an `[app: [key: value, ...], ...]` literal into a tree. Non-empty
 * `key: value` lists with distinct keys become nested groups.
 */
export function treeFromLiteral(literal: Literal): ConfigTree {
  return appEntries(literal, "config").map((entry) => ({
    app: entry.key,
    options: optionsFromPairs(appEntries(entry.value, identifierText(entry.key))),
  }));
}

function appEntries(literal: Literal, owner: string): readonly LiteralPair[] {
  if (literal.kind === "pairs") {
    return literal.entries;
  }
  if (literal.kind === "list" && literal.items.length === 0) {
    return [];
  }
  throw new BadInputError(`expected a key: value list for ${owner}`);
}

function isGroup(literal: Literal): literal is PairsLiteral {
  if (literal.kind !== "pairs" || literal.entries.length === 0) {
    return false;
  }
  const keys = new Set(literal.entries.map((entry) => identifierText(entry.key)));
  return keys.size === literal.entries.length;
}

function optionsFromPairs(entries: readonly LiteralPair[]): OptionList {
  return entries.map(
    (entry): OptionEntry => ({
      key: entry.key,
      value: isGroup(entry.value)
        ? { kind: "nested", options: optionsFromPairs(entry.value.entries) }
        : { kind: "leaf", literal: entry.value },
    }),
  );
}

// ============================================================================
// YAML files
// ============================================================================

export function treeFromYaml(content: string): ConfigTree {
  let document: unknown;
  try {
    document = YAML.parse(content, { intAsBigInt: true });
  } catch (error) {
    throw new BadInputError(`config file is not valid YAML: ${asError(error).message}`);
  }
  if (document === null || document === undefined) {
    return [];
  }
  if (!isRecord(document)) {
    throw new BadInputError("expected a YAML mapping of app names to options");
  }
  return Object.entries(document).map(([name, options]) => {
    if (!isRecord(options)) {
      throw new BadInputError(`expected a mapping of options for app "${name}"`);
    }
    return { app: yamlKey(name), options: optionsFromYaml(options) };
  });
}

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function yamlKey(name: string): Identifier {
  const id = parseIdentifier(name);
  if (!id) {
    throw new BadInputError(`"${name}" is not a valid identifier`);
  }
  return id;
}

function optionsFromYaml(record: Record<string, unknown>): OptionList {
  return Object.entries(record).map(
    ([name, value]): OptionEntry => ({
      key: yamlKey(name),
      value: isRecord(value)
        ? { kind: "nested", options: optionsFromYaml(value) }
        : { kind: "leaf", literal: literalFromYaml(value, name) },
    }),
  );
}

function literalFromYaml(value: unknown, name: string): Literal {
  if (value === null || value === undefined) {
    return { kind: "null" };
  }
  if (typeof value === "bigint") {
    return { kind: "integer", value };
  }
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new BadInputError(`"${name}" holds a non-finite number`);
    }
    return { kind: "float", value };
  }
  if (typeof value === "boolean") {
    return { kind: "boolean", value };
  }
  if (typeof value === "string") {
    return { kind: "string", value };
  }
  if (Array.isArray(value)) {
    return { kind: "list", items: value.map((item) => literalFromYaml(item, name)) };
  }
  if (isRecord(value)) {
    return {
      kind: "pairs",
      entries: Object.entries(value).map(([key, item]) => ({ key: yamlKey(key), value: literalFromYaml(item, key) })),
    };
  }
  throw new BadInputError(`"${name}" holds a value that cannot be represented`);
}
