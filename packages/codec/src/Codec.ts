/**
 * Codec - encode/decode operations bound to one namespace tag
 */

import type {
  DecodeOutcome,
  EncodedConfigMap,
  Identifier,
  Literal,
} from "./types/index.js";
import { type CodecSettings, loadCodecSettings } from "./config/settings.js";
import { decodePath, encodePath, type PathDecodeResult } from "./codec/PathCodec.js";
import { decodeValue, encodeValue, type ValueDecodeResult } from "./codec/ValueCodec.js";
import { flatten } from "./tree/TreeFlattener.js";
import { decodeAndMerge } from "./decoder/Decoder.js";

export interface Codec {
  readonly namespace: string;
  encode(tree: unknown): EncodedConfigMap;
  decode(flat: unknown): DecodeOutcome;
  encodePath(segments: readonly Identifier[]): string;
  decodePath(text: string): PathDecodeResult;
  encodeValue(literal: Literal): string;
  decodeValue(text: string): ValueDecodeResult;
}

export function createCodec(settings: Partial<CodecSettings> = {}): Codec {
  const { namespace } = loadCodecSettings(settings);
  return {
    namespace,
    encode: (tree) => flatten(tree, { namespace }),
    decode: (flat) => decodeAndMerge(flat, { namespace }),
    encodePath: (segments) => encodePath(segments, { namespace }),
    decodePath: (text) => decodePath(text, { namespace }),
    encodeValue,
    decodeValue,
  };
}
