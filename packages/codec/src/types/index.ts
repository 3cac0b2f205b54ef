/**
 * Core types for the flatconf codec
 */

// ============================================================================
// Identifier Types
// ============================================================================

/** Bare, lowercase-leading name such as `level` or `my_app`. */
export interface SymbolIdentifier {
  readonly kind: "symbol";
  readonly name: string;
}

/** Uppercase-leading dotted path such as `MyApp.Endpoint`. */
export interface QualifiedIdentifier {
  readonly kind: "qualified";
  readonly segments: readonly string[];
}

export type Identifier = SymbolIdentifier | QualifiedIdentifier;

// ============================================================================
// Literal Types
// ============================================================================

export interface IntegerLiteral {
  readonly kind: "integer";
  readonly value: bigint;
}

export interface FloatLiteral {
  readonly kind: "float";
  readonly value: number;
}

export interface BooleanLiteral {
  readonly kind: "boolean";
  readonly value: boolean;
}

export interface NullLiteral {
  readonly kind: "null";
}

export interface StringLiteral {
  readonly kind: "string";
  readonly value: string;
}

export interface ListLiteral {
  readonly kind: "list";
  readonly items: readonly Literal[];
}

export interface LiteralPair {
  readonly key: Identifier;
  readonly value: Literal;
}

/**
 * Ordered `key: value` list. Unlike a nested option group this is a single
 * value and is encoded under one key.
 */
export interface PairsLiteral {
  readonly kind: "pairs";
  readonly entries: readonly LiteralPair[];
}

export interface TupleLiteral {
  readonly kind: "tuple";
  readonly items: readonly Literal[];
}

export type Literal =
  | IntegerLiteral
  | FloatLiteral
  | BooleanLiteral
  | NullLiteral
  | StringLiteral
  | SymbolIdentifier
  | QualifiedIdentifier
  | ListLiteral
  | PairsLiteral
  | TupleLiteral;

// ============================================================================
// Config Tree Types
// ============================================================================

export interface LeafValue {
  readonly kind: "leaf";
  readonly literal: Literal;
}

export interface NestedValue {
  readonly kind: "nested";
  readonly options: OptionList;
}

/**
 * Whether an option holds a value or a group of further options is decided
 * by whoever builds the tree, never inferred from the value's shape.
 */
export type OptionValue = LeafValue | NestedValue;

export interface OptionEntry {
  readonly key: Identifier;
  readonly value: OptionValue;
}

export type OptionList = readonly OptionEntry[];

export interface AppConfig {
  readonly app: Identifier;
  readonly options: OptionList;
}

export type ConfigTree = readonly AppConfig[];

// ============================================================================
// Encoded Types
// ============================================================================

export type EncodedKey = string;
export type EncodedValue = string;
export type EncodedConfigMap = Record<EncodedKey, EncodedValue>;

export interface NamespaceOptions {
  /** Fixed prefix every encoded key starts with (default: "cfg") */
  namespace?: string;
}

export type DecodeResult<T, E extends Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export type ErrorKind = "bad_key" | "bad_value";

export interface InvalidEntry {
  key: string;
  value: string;
  kind: ErrorKind;
  message: string;
}

export interface DecodeOutcome {
  tree: ConfigTree;
  invalid: InvalidEntry[];
}

// ============================================================================
// Error Types
// ============================================================================

export type ErrorCode = "BAD_INPUT" | "BAD_KEY" | "BAD_VALUE" | "LOAD_ERROR" | "SETTINGS_ERROR";

export class FlatconfError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = "FlatconfError";
  }
}

/** The top-level argument is not the expected container; fails the whole call. */
export class BadInputError extends FlatconfError {
  constructor(message: string, details?: unknown) {
    super(message, "BAD_INPUT", details);
    this.name = "BadInputError";
  }
}

export class BadKeyError extends FlatconfError {
  constructor(message: string) {
    super(message, "BAD_KEY");
    this.name = "BadKeyError";
  }
}

export class BadValueError extends FlatconfError {
  constructor(
    message: string,
    public readonly position?: number,
  ) {
    super(position === undefined ? message : `${message} at position ${position}`, "BAD_VALUE");
    this.name = "BadValueError";
  }
}

export class LoadError extends FlatconfError {
  readonly cause: Error;

  constructor(message: string, cause: Error) {
    super(`${message}: ${cause.message}`, "LOAD_ERROR");
    this.name = "LoadError";
    this.cause = cause;
  }
}

export class SettingsError extends FlatconfError {
  constructor(message: string, details?: unknown) {
    super(message, "SETTINGS_ERROR", details);
    this.name = "SettingsError";
  }
}
