import { ConfigurationError } from "../errors";
import type { CommandRule } from "../types/contracts";

const ACTUAL = "actual ";

export const DEFAULT_COMMAND_RULES: readonly CommandRule[] = Object.freeze([
  { name: "newLine", triggers: ["new line", "newline"], escapePrefix: ACTUAL, symbol: "\n" },
  { name: "invertedComma", triggers: ["inverted comma"], escapePrefix: ACTUAL, symbol: "\"" },
  { name: "comma", triggers: ["comma"], escapePrefix: ACTUAL, symbol: "," },
  { name: "fullStop", triggers: ["full stop"], escapePrefix: ACTUAL, symbol: "." }
]);

export function escapePhrase(rule: CommandRule, trigger: string): string {
  return rule.escapePrefix + trigger;
}

export function normalizePhrase(phrase: string): string {
  return phrase.trim().replace(/\s+/g, " ").toLowerCase();
}

export function validateCommandRules(rules: readonly CommandRule[]): void {
  const seen = new Map<string, string>();

  for (const rule of rules) {
    if (rule.triggers.length === 0) {
      throw new ConfigurationError(`Command rule "${rule.name}" has no trigger phrase.`);
    }
    if (!rule.escapePrefix.trim()) {
      throw new ConfigurationError(`Command rule "${rule.name}" has an empty escape prefix.`);
    }

    for (const trigger of rule.triggers) {
      const key = normalizePhrase(trigger);
      if (!/^\w/.test(key) || !/\w$/.test(key)) {
        throw new ConfigurationError(
          `Trigger "${trigger}" of rule "${rule.name}" must start and end with a word character.`
        );
      }
      const owner = seen.get(key);
      if (owner !== undefined) {
        throw new ConfigurationError(
          `Trigger "${trigger}" is declared by both "${owner}" and "${rule.name}".`
        );
      }
      seen.set(key, rule.name);
    }
  }
}
