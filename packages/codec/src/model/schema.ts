import { z } from "zod";
import type {
  ConfigTree,
  Identifier,
  Literal,
  OptionList,
  OptionValue,
} from "../types/index.js";
import { QUALIFIED_SEGMENT_PATTERN, SYMBOL_NAME_PATTERN } from "./identifier.js";

// ============================================================================
// Runtime schemas for caller-supplied trees
// ============================================================================

const SymbolIdentifierSchema = z.object({
  kind: z.literal("symbol"),
  name: z.string().regex(SYMBOL_NAME_PATTERN, "invalid symbol name"),
});

const QualifiedIdentifierSchema = z.object({
  kind: z.literal("qualified"),
  segments: z.array(z.string().regex(QUALIFIED_SEGMENT_PATTERN, "invalid qualified name segment")).min(1),
});

export const IdentifierSchema: z.ZodType<Identifier> = z.union([
  SymbolIdentifierSchema,
  QualifiedIdentifierSchema,
]);

export const LiteralSchema: z.ZodType<Literal> = z.lazy(() =>
  z.union([
    z.object({ kind: z.literal("integer"), value: z.bigint() }),
    z.object({ kind: z.literal("float"), value: z.number().finite() }),
    z.object({ kind: z.literal("boolean"), value: z.boolean() }),
    z.object({ kind: z.literal("null") }),
    z.object({ kind: z.literal("string"), value: z.string() }),
    SymbolIdentifierSchema,
    QualifiedIdentifierSchema,
    z.object({ kind: z.literal("list"), items: z.array(LiteralSchema) }),
    z.object({
      kind: z.literal("pairs"),
      entries: z.array(z.object({ key: IdentifierSchema, value: LiteralSchema })),
    }),
    z.object({ kind: z.literal("tuple"), items: z.array(LiteralSchema) }),
  ]),
);

export const OptionValueSchema: z.ZodType<OptionValue> = z.lazy(() =>
  z.union([
    z.object({ kind: z.literal("leaf"), literal: LiteralSchema }),
    z.object({ kind: z.literal("nested"), options: OptionListSchema }),
  ]),
);

export const OptionListSchema: z.ZodType<OptionList> = z.lazy(() =>
  z.array(z.object({ key: IdentifierSchema, value: OptionValueSchema })),
);

export const ConfigTreeSchema: z.ZodType<ConfigTree> = z.array(
  z.object({ app: IdentifierSchema, options: OptionListSchema }),
);

export const EncodedConfigMapSchema = z.record(z.string(), z.string());

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 3)
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
