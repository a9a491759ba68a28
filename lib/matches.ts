import type { Match, RuleSet } from "./schema";

export function collectMatches(text: string, rules: RuleSet): Match[] {
  const out: Match[] = [];
  rules.forEach((rule, order) => {
    for (const m of text.matchAll(rule.pattern)) {
      if (!m[0] || m.index === undefined) continue;
      out.push({ start: m.index, end: m.index + m[0].length, text: m[0], rule, order });
    }
  });
  return out;
}

/**
 * Orders matches left to right (longer span first on a shared start, then
 * catalog order) and drops any match that starts inside one already taken.
 */
export function planEdits(matches: ReadonlyArray<Match>): Match[] {
  const sorted = [...matches].sort((a, b) =>
    a.start - b.start || b.end - a.end || a.order - b.order
  );

  const plan: Match[] = [];
  let cursor = 0;
  for (const m of sorted) {
    if (m.start < cursor) continue;
    plan.push(m);
    cursor = m.end;
  }
  return plan;
}
