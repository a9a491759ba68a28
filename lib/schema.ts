export const RULE_CATEGORIES = [
  "hedging",
  "uncertainty",
  "weak_verbs",
  "passive",
  "questions",
  "filler",
  "negative_self_talk",
  "grammar",
] as const;

export type RuleCategory = (typeof RULE_CATEGORIES)[number];

export type ChangeType =
  | "HEDGING_REMOVED"
  | "UNCERTAINTY_REMOVED"
  | "WEAK_VERB_STRENGTHENED"
  | "PASSIVE_FLAGGED"
  | "QUESTION_REMOVED"
  | "QUALIFIER_REMOVED"
  | "SELF_TALK_REFRAMED"
  | "GRAMMAR_FIXED";

export const CHANGE_LABELS: Record<ChangeType, string> = {
  HEDGING_REMOVED: "Hedging Removed",
  UNCERTAINTY_REMOVED: "Uncertainty Removed",
  WEAK_VERB_STRENGTHENED: "Weak Verb Strengthened",
  PASSIVE_FLAGGED: "Passive Voice Flagged",
  QUESTION_REMOVED: "Question Removed",
  QUALIFIER_REMOVED: "Qualifier Removed",
  SELF_TALK_REFRAMED: "Self-Talk Reframed",
  GRAMMAR_FIXED: "Grammar Fixed",
};

export function changeTypeFor(category: RuleCategory): ChangeType {
  switch (category) {
    case "hedging":            return "HEDGING_REMOVED";
    case "uncertainty":        return "UNCERTAINTY_REMOVED";
    case "weak_verbs":         return "WEAK_VERB_STRENGTHENED";
    case "passive":            return "PASSIVE_FLAGGED";
    case "questions":          return "QUESTION_REMOVED";
    case "filler":             return "QUALIFIER_REMOVED";
    case "negative_self_talk": return "SELF_TALK_REFRAMED";
    case "grammar":            return "GRAMMAR_FIXED";
    default: {
      const unknown: never = category;
      throw new Error(`unknown rule category: ${String(unknown)}`);
    }
  }
}

// "replace" with empty text deletes the span; "flag" reports it and leaves it in place
export type Rewrite =
  | { kind: "replace"; text: string }
  | { kind: "flag" };

export type Rule = Readonly<{
  id: string;            // "<category>.<index>"
  category: RuleCategory;
  pattern: RegExp;       // always flagged "gi"
  rewrite: Rewrite;
  explanation: string;
  impact: number;        // positive integer
}>;

export type RuleSet = ReadonlyArray<Rule>;

export type Match = {
  start: number;
  end: number;
  text: string;
  rule: Rule;
  order: number;         // index of the rule in its RuleSet
};

export type Change = Readonly<{
  change_type: ChangeType;
  category: RuleCategory;
  rule: string;
  before: string;
  after: string;         // "[removed]" for deletions
  explanation: string;
  impact: number;
  start: number;         // offsets into the original text
  end: number;
}>;

export type Report = Readonly<{
  original: string;
  transformed: string;
  changes: ReadonlyArray<Change>;
  confidence_before: number; // 0-100
  confidence_after: number;  // 0-100
  total_words_removed: number;
  total_changes: number;
}>;

export type ProcessingState = "chaos" | "transform" | "coherent";

export type CoherenceMetrics = {
  psi: number;           // chaos, 0-1
  delta: number;         // share of chaos removed, 0-1
  omega: number;         // coherence, 0-1
  conservation: number;
  efficiency: number;
  state: ProcessingState;
  improvement: number;
  improvement_pct: number;
};

