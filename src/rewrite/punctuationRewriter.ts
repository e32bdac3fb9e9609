import type { CommandRule } from "../types/contracts";
import { DEFAULT_COMMAND_RULES, escapePhrase, validateCommandRules } from "./commandRules";

interface PhraseEntry {
  kind: "escape" | "trigger";
  rule: CommandRule;
  phrase: string;
  /** Strips the escape prefix from a matched escape, leaving the trigger as spoken. */
  prefix?: RegExp;
}

interface CompiledRules {
  pattern: RegExp;
  entries: PhraseEntry[];
}

const compiled = new WeakMap<readonly CommandRule[], CompiledRules>();

/**
 * Replaces spoken punctuation commands with their symbols.
 *
 * All escape and trigger phrases of all rules are matched in one
 * case-insensitive, left-to-right, non-overlapping scan. At any position the
 * longest phrase wins, so "actual comma" is consumed as an escape before the
 * bare "comma" inside it can be seen. An escape yields the trigger words as
 * spoken; a trigger yields the rule's symbol. Replacement output is never
 * rescanned.
 *
 * Text between matches is copied unchanged, except that whitespace which only
 * separates two consecutive phrases is dropped when either of them is a
 * trigger. Two escapes in a row are ordinary words and keep their spacing.
 */
export function rewrite(text: string, rules: readonly CommandRule[] = DEFAULT_COMMAND_RULES): string {
  const { pattern, entries } = compile(rules);

  let out = "";
  let cursor = 0;
  let previous: PhraseEntry["kind"] | undefined;

  for (const match of text.matchAll(pattern)) {
    const start = match.index ?? 0;
    const gap = text.slice(cursor, start);
    const entry = entries[matchedEntryIndex(match)];

    const joinsSymbol = previous === "trigger" || (previous !== undefined && entry.kind === "trigger");
    if (!(joinsSymbol && /^\s*$/.test(gap))) {
      out += gap;
    }
    out += entry.kind === "escape" ? stripPrefix(match[0], entry) : entry.rule.symbol;

    cursor = start + match[0].length;
    previous = entry.kind;
  }

  return cursor === 0 ? text : out + text.slice(cursor);
}

function compile(rules: readonly CommandRule[]): CompiledRules {
  const cached = compiled.get(rules);
  if (cached) {
    return cached;
  }

  validateCommandRules(rules);

  const entries: PhraseEntry[] = [];
  for (const rule of rules) {
    for (const trigger of rule.triggers) {
      entries.push({
        kind: "escape",
        rule,
        phrase: escapePhrase(rule, trigger),
        prefix: new RegExp(`^${wordsPattern(rule.escapePrefix)}\\s*`, "i")
      });
      entries.push({ kind: "trigger", rule, phrase: trigger });
    }
  }

  // Alternation takes the first branch that matches, so longest goes first.
  entries.sort((a, b) => wordCount(b.phrase) - wordCount(a.phrase) || b.phrase.length - a.phrase.length);

  const alternatives = entries.map((entry) => `(${wordsPattern(entry.phrase)})`);
  const result: CompiledRules = {
    pattern: new RegExp(`\\b(?:${alternatives.join("|")})\\b`, "gi"),
    entries
  };
  compiled.set(rules, result);
  return result;
}

function matchedEntryIndex(match: RegExpMatchArray): number {
  for (let i = 1; i < match.length; i++) {
    if (match[i] !== undefined) {
      return i - 1;
    }
  }
  throw new Error(`Unattributed command match: "${match[0]}"`);
}

function stripPrefix(matched: string, entry: PhraseEntry): string {
  return entry.prefix ? matched.replace(entry.prefix, "") : matched;
}

function wordsPattern(phrase: string): string {
  return phrase
    .trim()
    .split(/\s+/)
    .map(escapeRegExp)
    .join("\\s+");
}

function wordCount(phrase: string): number {
  return phrase.trim().split(/\s+/).length;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
