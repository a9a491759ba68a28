import { DEFAULT_RULES } from "./patterns";
import { collectMatches, planEdits } from "./matches";
import { applyPlan, normalizeText } from "./rewrite";
import { confidenceScore, countWords } from "./score";
import type { Report, RuleSet } from "./schema";

export type Engine = {
  rules: RuleSet;
  score(text: string): number;
  transform(text: string): Report;
};

export function createEngine(rules: RuleSet = DEFAULT_RULES): Engine {
  const score = (text: string) => confidenceScore(text, rules);

  function transform(text: string): Report {
    if (!text.trim()) {
      return {
        original: text, transformed: text, changes: [],
        confidence_before: 100, confidence_after: 100,
        total_words_removed: 0, total_changes: 0,
      };
    }

    const confidence_before = score(text);
    const plan = planEdits(collectMatches(text, rules));
    const spliced = applyPlan(text, plan);
    const transformed = normalizeText(spliced.text);

    return {
      original: text,
      transformed,
      changes: spliced.changes,
      confidence_before,
      confidence_after: score(transformed),
      total_words_removed: Math.max(0, countWords(text) - countWords(transformed)),
      total_changes: spliced.changes.length,
    };
  }

  return { rules, score, transform };
}

const defaultEngine = createEngine();

export const score = defaultEngine.score;
export const transform = defaultEngine.transform;
