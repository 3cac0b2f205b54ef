/**
 * TreeFlattener - config tree to encoded key/value pairs
 */

import {
  BadInputError,
  type EncodedConfigMap,
  type Identifier,
  type NamespaceOptions,
  type OptionList,
} from "../types/index.js";
import { ConfigTreeSchema, describeIssues } from "../model/schema.js";
import { encodePath, resolveNamespace } from "../codec/PathCodec.js";
import { encodeValue } from "../codec/ValueCodec.js";

const EMPTY_GROUP = "[]";

/**
 * Flatten a tree into encoded pairs. The argument is validated first, so a
 * malformed tree fails the whole call with BadInputError and nothing is
 * emitted. When two entries encode to the same key the later one wins.
 */
export function flatten(tree: unknown, options: NamespaceOptions = {}): EncodedConfigMap {
  const namespace = resolveNamespace(options);
  const parsed = ConfigTreeSchema.safeParse(tree);
  if (!parsed.success) {
    throw new BadInputError(
      `expected a config tree keyed by app (${describeIssues(parsed.error)})`,
      parsed.error.issues,
    );
  }

  const encoded: EncodedConfigMap = {};
  for (const { app, options: appOptions } of parsed.data) {
    for (const [key, value] of flattenOptions([app], appOptions, namespace)) {
      encoded[key] = value;
    }
  }
  return encoded;
}

function* flattenOptions(
  prefix: readonly Identifier[],
  options: OptionList,
  namespace: string,
): Generator<[string, string]> {
  for (const { key, value } of options) {
    const path = [...prefix, key];
    if (value.kind === "nested" && value.options.length > 0) {
      yield* flattenOptions(path, value.options, namespace);
    } else {
      const text = value.kind === "leaf" ? encodeValue(value.literal) : EMPTY_GROUP;
      yield [encodePath(path, { namespace }), text];
    }
  }
}
