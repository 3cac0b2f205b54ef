/**
 * flatconf codec
 *
 * Converts namespaced configuration trees to flat string key/value maps
 * and back, for key/value stores that only hold strings.
 *
 * @example
 * ```typescript
 * import { app, createCodec, group, int, option, str, sym } from "@flatconf/codec";
 *
 * const codec = createCodec({ namespace: "cfg" });
 *
 * const encoded = codec.encode([
 *   app("logger", option("level", sym("info"))),
 *   app("my_app", option("MyApp.Endpoint", group(option("port", int(4000)), option("host", str("localhost"))))),
 * ]);
 * // {
 * //   "cfg-logger-level": ":info",
 * //   "cfg-my_app-MyApp.Endpoint-port": "4000",
 * //   "cfg-my_app-MyApp.Endpoint-host": "\"localhost\""
 * // }
 *
 * const { tree, invalid } = codec.decode({ ...encoded, "bad key": "22" });
 * // invalid: [{ key: "bad key", value: "22", kind: "bad_key", ... }]
 * ```
 */

// Codec
export { createCodec } from "./Codec.js";
export type { Codec } from "./Codec.js";
export {
  encodePath,
  decodePath,
  resolveNamespace,
  DEFAULT_NAMESPACE,
  PATH_SEPARATOR,
} from "./codec/PathCodec.js";
export type { DecodedPath, PathDecodeResult } from "./codec/PathCodec.js";
export { encodeValue, decodeValue, parseLiteral } from "./codec/ValueCodec.js";
export type { ValueDecodeResult } from "./codec/ValueCodec.js";

// Tree
export { flatten } from "./tree/TreeFlattener.js";
export { asGroup, mergeApp, mergeOptions, mergeTrees, mergeValues } from "./tree/TreeMerger.js";
export { decodeAndMerge, decodeEntry } from "./decoder/Decoder.js";
export type { EntryDecodeResult } from "./decoder/Decoder.js";

// Model
export {
  app,
  bool,
  float,
  group,
  identifier,
  int,
  leaf,
  list,
  nil,
  option,
  pairs,
  qname,
  str,
  sym,
  tuple,
} from "./model/literal.js";
export { identifierText, parseIdentifier } from "./model/identifier.js";
export { identifiersEqual, literalsEqual, optionListsEqual, treesEqual } from "./model/equality.js";
export { ConfigTreeSchema, LiteralSchema } from "./model/schema.js";

// Collaborators
export { InMemoryEnvironment, applyDecoded, applyEncoded } from "./apply/ConfigEnvironment.js";
export type { IConfigEnvironment } from "./apply/ConfigEnvironment.js";
export {
  encodeFile,
  loadConfigFile,
  treeFromExpression,
  treeFromLiteral,
  treeFromYaml,
} from "./loader/ConfigFileLoader.js";

// Settings & logging
export { CodecSettingsSchema, loadCodecSettings } from "./config/settings.js";
export type { CodecSettings } from "./config/settings.js";
export { createLogger, appLogger } from "./observability/logger.js";

// Types
export type {
  AppConfig,
  ConfigTree,
  DecodeOutcome,
  DecodeResult,
  EncodedConfigMap,
  EncodedKey,
  EncodedValue,
  ErrorKind,
  Identifier,
  InvalidEntry,
  LeafValue,
  Literal,
  LiteralPair,
  NamespaceOptions,
  NestedValue,
  OptionEntry,
  OptionList,
  OptionValue,
  QualifiedIdentifier,
  SymbolIdentifier,
} from "./types/index.js";
export {
  FlatconfError,
  BadInputError,
  BadKeyError,
  BadValueError,
  LoadError,
  SettingsError,
} from "./types/index.js";
