import type { RuleSet } from "./schema";

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

export function countMatches(text: string, pattern: RegExp): number {
  let n = 0;
  for (const m of text.matchAll(pattern)) {
    if (m[0].length > 0) n++;
  }
  return n;
}

/**
 * Confidence 0-100 as a penalty density: every rule's matches times its impact,
 * per word. Rules are counted independently, so one span can be penalized twice.
 */
export function confidenceScore(text: string, rules: RuleSet): number {
  if (!text.trim()) return 100;

  const words = Math.max(1, countWords(text));
  let penalty = 0;
  for (const rule of rules) {
    penalty += countMatches(text, rule.pattern) * rule.impact;
  }

  const clamp = (n: number) => Math.max(0, Math.min(100, n));
  return clamp(100 - (penalty / words) * 100);
}
