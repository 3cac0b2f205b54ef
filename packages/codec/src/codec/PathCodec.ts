/**
 * PathCodec - namespace-tagged, hyphen-joined option paths
 *
 * `cfg-my_app-MyApp.Endpoint-url` addresses the `url` option inside the
 * `MyApp.Endpoint` group of the `my_app` application.
 */

import {
  BadInputError,
  BadKeyError,
  type DecodeResult,
  type Identifier,
  type NamespaceOptions,
} from "../types/index.js";
import { identifierText, isValidIdentifier, parseIdentifier } from "../model/identifier.js";

export const PATH_SEPARATOR = "-";
export const DEFAULT_NAMESPACE = "cfg";
export const NAMESPACE_PATTERN = /^[A-Za-z0-9_.]+$/;

export interface DecodedPath {
  app: Identifier;
  path: Identifier[];
}

export type PathDecodeResult = DecodeResult<DecodedPath, BadKeyError>;

export function resolveNamespace(options: NamespaceOptions = {}): string {
  const namespace = options.namespace ?? DEFAULT_NAMESPACE;
  if (!NAMESPACE_PATTERN.test(namespace)) {
    throw new BadInputError(
      `namespace "${namespace}" may only include letters, numbers, underscore, or period`,
    );
  }
  return namespace;
}

export function encodePath(segments: readonly Identifier[], options: NamespaceOptions = {}): string {
  const namespace = resolveNamespace(options);
  if (segments.length === 0) {
    throw new BadInputError("an encoded key needs at least an app segment");
  }
  const parts = segments.map((segment) => {
    if (!isValidIdentifier(segment)) {
      throw new BadInputError(`"${identifierText(segment)}" is not a valid path segment`);
    }
    return identifierText(segment);
  });
  return [namespace, ...parts].join(PATH_SEPARATOR);
}

export function decodePath(text: string, options: NamespaceOptions = {}): PathDecodeResult {
  const prefix = `${resolveNamespace(options)}${PATH_SEPARATOR}`;
  if (!text.startsWith(prefix)) {
    return { ok: false, error: new BadKeyError(`key "${text}" does not start with "${prefix}"`) };
  }

  const segments: Identifier[] = [];
  for (const piece of text.slice(prefix.length).split(PATH_SEPARATOR)) {
    if (piece.length === 0) {
      return { ok: false, error: new BadKeyError(`key "${text}" contains an empty path segment`) };
    }
    const segment = parseIdentifier(piece);
    if (!segment) {
      return { ok: false, error: new BadKeyError(`key "${text}" has an invalid path segment "${piece}"`) };
    }
    segments.push(segment);
  }

  const [app, ...path] = segments;
  return { ok: true, value: { app, path } };
}
