/**
 * Codec settings
 *
 * The namespace tag comes from, in order: an explicit override,
 * the file named by `FLATCONF_NAMESPACE_FILE`, `FLATCONF_NAMESPACE`, then
 * the default `cfg`.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { SettingsError } from "../types/index.js";
import { DEFAULT_NAMESPACE, NAMESPACE_PATTERN } from "../codec/PathCodec.js";
import { describeIssues } from "../model/schema.js";

export const NAMESPACE_ENV = "FLATCONF_NAMESPACE";

export const CodecSettingsSchema = z.object({
  namespace: z
    .string()
    .regex(NAMESPACE_PATTERN, "namespace may only include letters, numbers, underscore, or period")
    .default(DEFAULT_NAMESPACE),
});
export type CodecSettings = z.infer<typeof CodecSettingsSchema>;

function readFileValue(path: string): string | undefined {
  try {
    const content = readFileSync(path, "utf-8").trim();
    return content.length > 0 ? content : undefined;
  } catch {
    return undefined;
  }
}

export function resolveSetting(name: string): string | undefined {
  const filePath = process.env[`${name}_FILE`];
  if (filePath) {
    const fromFile = readFileValue(filePath);
    if (fromFile !== undefined) {
      return fromFile;
    }
  }
  const direct = process.env[name]?.trim();
  return direct ? direct : undefined;
}

export function loadCodecSettings(overrides: Partial<CodecSettings> = {}): CodecSettings {
  const result = CodecSettingsSchema.safeParse({
    namespace: overrides.namespace ?? resolveSetting(NAMESPACE_ENV),
  });
  if (!result.success) {
    throw new SettingsError(`invalid codec settings: ${describeIssues(result.error)}`, result.error.issues);
  }
  return result.data;
}
