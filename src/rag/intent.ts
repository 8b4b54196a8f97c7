import type { ChunkIntent } from "./types.js";

/**
 * Assigns an intent label to a code chunk
 */
export interface IntentTagger {
  tag(text: string, language: string): ChunkIntent;
}

/** Ordered rules; the first one whose keyword appears wins */
const INTENT_RULES: readonly { readonly intent: ChunkIntent; readonly keywords: readonly string[] }[] = [
  { intent: "test", keywords: ["test", "spec"] },
  { intent: "config", keywords: ["config", "settings"] },
  { intent: "class", keywords: ["class "] },
  { intent: "function", keywords: ["def ", "function "] },
  { intent: "type", keywords: ["interface ", "type "] },
  { intent: "endpoint", keywords: ["route", "endpoint"] },
  { intent: "query", keywords: ["query", "select"] },
];

/**
 * Case-insensitive keyword tagger. Language is ignored.
 */
export class KeywordIntentTagger implements IntentTagger {
  tag(text: string, _language: string): ChunkIntent {
    const lower = text.toLowerCase();
    const rule = INTENT_RULES.find(({ keywords }) =>
      keywords.some((keyword) => lower.includes(keyword))
    );
    return rule?.intent ?? "utility";
  }
}
