import { type Change, type Match, changeTypeFor } from "./schema";

export const REMOVED = "[removed]";

/** Splices a non-overlapping plan into the text in one pass; change offsets stay on the original. */
export function applyPlan(text: string, plan: ReadonlyArray<Match>): { text: string; changes: Change[] } {
  let out = "";
  let cursor = 0;
  const changes: Change[] = [];

  for (const m of plan) {
    const { rule } = m;
    const replacement = rule.rewrite.kind === "flag" ? m.text : rule.rewrite.text;

    out += text.slice(cursor, m.start) + replacement;
    cursor = m.end;

    changes.push({
      change_type: changeTypeFor(rule.category),
      category: rule.category,
      rule: rule.id,
      before: m.text,
      after: replacement || REMOVED,
      explanation: rule.explanation,
      impact: rule.impact,
      start: m.start,
      end: m.end,
    });
  }

  out += text.slice(cursor);
  return { text: out, changes };
}

export function normalizeText(text: string): string {
  const out = text
    .replace(/\s+/g, " ")
    .trim()
    .replace(/\s+([.,!?;:])/g, "$1")
    .replace(/([.,!?;:])([A-Za-z])/g, "$1 $2");

  return out ? out.charAt(0).toUpperCase() + out.slice(1) : out;
}
