import {
  BadInputError,
  type Identifier,
  type InvalidEntry,
  type NamespaceOptions,
  type OptionList,
  type OptionValue,
} from "../types/index.js";
import { identifierText } from "../model/identifier.js";
import { ConfigTreeSchema, describeIssues } from "../model/schema.js";
import { mergeValues } from "../tree/TreeMerger.js";
import { decodeAndMerge } from "../decoder/Decoder.js";
import { appLogger } from "../observability/logger.js";

/**
 * Capability for reading and writing the current configuration of a
 * running program. The codec never writes configuration itself; callers
 * hand an implementation to `applyDecoded` / `applyEncoded`.
 */
export interface IConfigEnvironment {
  /**
   * Get the current value of one top-level option of an app.
   * @returns The value, or undefined when the option is not set
   */
  get(app: Identifier, key: Identifier): OptionValue | undefined;

  /**
   * Replace the value of one top-level option of an app.
   */
  set(app: Identifier, key: Identifier, value: OptionValue): void;
}

/**
 * Map-backed environment, useful for tests and for staging configuration
 * before handing it to the real program.
 */
export class InMemoryEnvironment implements IConfigEnvironment {
  private readonly apps = new Map<string, Map<string, { key: Identifier; value: OptionValue }>>();

  get(app: Identifier, key: Identifier): OptionValue | undefined {
    return this.apps.get(identifierText(app))?.get(identifierText(key))?.value;
  }

  set(app: Identifier, key: Identifier, value: OptionValue): void {
    const appId = identifierText(app);
    let options = this.apps.get(appId);
    if (!options) {
      options = new Map();
      this.apps.set(appId, options);
    }
    options.set(identifierText(key), { key, value });
  }

  /** All options currently set for an app, in the order they were first set. */
  getAll(app: Identifier): OptionList {
    return Array.from(this.apps.get(identifierText(app))?.values() ?? []);
  }
}

/**
 * Apply a decoded tree, deep-merging each top-level option with the value
 * already in the environment.
 */
export function applyDecoded(tree: unknown, environment: IConfigEnvironment): void {
  const parsed = ConfigTreeSchema.safeParse(tree);
  if (!parsed.success) {
    throw new BadInputError(
      `expected a config tree keyed by app (${describeIssues(parsed.error)})`,
      parsed.error.issues,
    );
  }

  for (const { app, options } of parsed.data) {
    for (const { key, value } of options) {
      const current = environment.get(app, key);
      environment.set(app, key, current ? mergeValues(current, value) : value);
    }
    appLogger.debug(
      { app: identifierText(app), options: options.length, event: "environment.applied" },
      "Applied app configuration",
    );
  }
}

/**
 * Decode and apply an encoded map. Entries that cannot be decoded are
 * skipped and returned so the caller can decide whether they matter.
 */
export function applyEncoded(
  flat: unknown,
  environment: IConfigEnvironment,
  options: NamespaceOptions = {},
): InvalidEntry[] {
  const { tree, invalid } = decodeAndMerge(flat, options);
  if (invalid.length > 0) {
    appLogger.warn(
      { invalid: invalid.map((entry) => ({ key: entry.key, kind: entry.kind })), event: "environment.invalid_entries" },
      "Some encoded entries could not be decoded and were not applied",
    );
  }
  applyDecoded(tree, environment);
  return invalid;
}
