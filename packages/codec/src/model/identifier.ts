import {
  BadInputError,
  type Identifier,
  type QualifiedIdentifier,
  type SymbolIdentifier,
} from "../types/index.js";

export const SYMBOL_NAME_PATTERN = /^[a-z_][A-Za-z0-9_@]*[?!]?$/;
export const QUALIFIED_SEGMENT_PATTERN = /^[A-Z][A-Za-z0-9_]*$/;

/**
 * Classify `text` by its first character: lowercase or underscore means a
 * symbol, anything else a qualified name. Returns undefined when the text is
 * not a well-formed identifier of the class it was sorted into.
 */
export function parseIdentifier(text: string): Identifier | undefined {
  if (text.length === 0) {
    return undefined;
  }
  if (/^[a-z_]/.test(text)) {
    return SYMBOL_NAME_PATTERN.test(text) ? { kind: "symbol", name: text } : undefined;
  }
  const segments = text.split(".");
  if (!segments.every((segment) => QUALIFIED_SEGMENT_PATTERN.test(segment))) {
    return undefined;
  }
  return { kind: "qualified", segments };
}

export function identifierText(id: Identifier): string {
  return id.kind === "symbol" ? id.name : id.segments.join(".");
}

export function isValidIdentifier(id: Identifier): boolean {
  if (id.kind === "symbol") {
    return SYMBOL_NAME_PATTERN.test(id.name);
  }
  return id.segments.length > 0 && id.segments.every((segment) => QUALIFIED_SEGMENT_PATTERN.test(segment));
}

export function identifier(text: string): Identifier {
  const parsed = parseIdentifier(text);
  if (!parsed) {
    throw new BadInputError(`"${text}" is not a valid identifier`);
  }
  return parsed;
}

export function sym(name: string): SymbolIdentifier {
  const parsed = parseIdentifier(name);
  if (!parsed || parsed.kind !== "symbol") {
    throw new BadInputError(`"${name}" is not a valid symbol name`);
  }
  return parsed;
}

export function qname(name: string): QualifiedIdentifier {
  const parsed = parseIdentifier(name);
  if (!parsed || parsed.kind !== "qualified") {
    throw new BadInputError(`"${name}" is not a valid qualified name`);
  }
  return parsed;
}
