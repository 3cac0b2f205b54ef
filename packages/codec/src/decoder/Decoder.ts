/**
 * Decoder - flat encoded map to config tree
 *
 * Every entry is decoded on its own, so a malformed key or value only costs
 * that entry. Valid entries are folded into the tree in ascending key order,
 * which makes collisions on the same leaf resolve the same way every time.
 */

import {
  BadInputError,
  type DecodeOutcome,
  type ErrorKind,
  type Identifier,
  type InvalidEntry,
  type Literal,
  type NamespaceOptions,
  type OptionEntry,
  type OptionList,
  type OptionValue,
} from "../types/index.js";
import { EncodedConfigMapSchema, describeIssues } from "../model/schema.js";
import { decodePath, resolveNamespace } from "../codec/PathCodec.js";
import { decodeValue } from "../codec/ValueCodec.js";
import { mergeApp } from "../tree/TreeMerger.js";
import { appLogger } from "../observability/logger.js";

const logger = appLogger.child({ component: "decoder" });

export type EntryDecodeResult =
  | { ok: true; app: Identifier; options: OptionList }
  | { ok: false; kind: ErrorKind; message: string };

/**
 * Decode one encoded pair into the app it configures and a single-path
 * option list ready to merge.
 */
export function decodeEntry(key: string, value: string, options: NamespaceOptions = {}): EntryDecodeResult {
  const path = decodePath(key, options);
  if (!path.ok) {
    return { ok: false, kind: "bad_key", message: path.error.message };
  }
  const literal = decodeValue(value);
  if (!literal.ok) {
    return { ok: false, kind: "bad_value", message: literal.error.message };
  }

  const { app, path: segments } = path.value;
  if (segments.length === 0) {
    if (literal.value.kind !== "pairs") {
      return { ok: false, kind: "bad_value", message: `app-level key "${key}" must hold a key: value list` };
    }
    return {
      ok: true,
      app,
      options: literal.value.entries.map((entry): OptionEntry => ({
        key: entry.key,
        value: { kind: "leaf", literal: entry.value },
      })),
    };
  }
  return { ok: true, app, options: nestValue(segments, literal.value) };
}

function nestValue(segments: readonly Identifier[], literal: Literal): OptionList {
  let value: OptionValue = { kind: "leaf", literal };
  for (let i = segments.length - 1; i > 0; i--) {
    value = { kind: "nested", options: [{ key: segments[i], value }] };
  }
  return [{ key: segments[0], value }];
}

function compareKeys(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}

function readEntries(flat: unknown): Array<[string, string]> {
  if (flat instanceof Map) {
    const entries: Array<[string, string]> = [];
    for (const [key, value] of flat) {
      if (typeof key !== "string" || typeof value !== "string") {
        throw new BadInputError("expected a map of string keys to string values");
      }
      entries.push([key, value]);
    }
    return entries;
  }
  const parsed = EncodedConfigMapSchema.safeParse(flat);
  if (!parsed.success) {
    throw new BadInputError(
      `expected a map of string keys to string values (${describeIssues(parsed.error)})`,
      parsed.error.issues,
    );
  }
  // zod rebuilds the record, which loses an own "__proto__" key
  const entries: Array<[string, string]> = [];
  for (const [key, value] of Object.entries(isRecord(flat) ? flat : parsed.data)) {
    if (typeof value === "string") {
      entries.push([key, value]);
    }
  }
  return entries;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function decodeAndMerge(flat: unknown, options: NamespaceOptions = {}): DecodeOutcome {
  const namespace = resolveNamespace(options);
  const entries = readEntries(flat).sort(([a], [b]) => compareKeys(a, b));

  let tree: DecodeOutcome["tree"] = [];
  const invalid: InvalidEntry[] = [];
  for (const [key, value] of entries) {
    const decoded = decodeEntry(key, value, { namespace });
    if (!decoded.ok) {
      invalid.push({ key, value, kind: decoded.kind, message: decoded.message });
      logger.debug(
        { key, kind: decoded.kind, reason: decoded.message, event: "decoder.invalid_entry" },
        "Skipping undecodable entry",
      );
      continue;
    }
    tree = mergeApp(tree, decoded.app, decoded.options);
  }

  logger.debug(
    { entries: entries.length, invalid: invalid.length, apps: tree.length, event: "decoder.decoded" },
    "Decoded encoded config map",
  );
  return { tree, invalid };
}
