import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { collectMatches, planEdits } from "../lib/matches";
import { compileRuleSet } from "../lib/patterns";
import { REMOVED, applyPlan, normalizeText } from "../lib/rewrite";

describe("normalizeText", () => {
  it("collapses whitespace and trims", () => {
    assert.equal(normalizeText("  we   ship \n today  "), "We ship today");
  });

  it("drops whitespace before punctuation", () => {
    assert.equal(normalizeText("we ship , today ."), "We ship, today.");
  });

  it("adds a space after punctuation followed by a letter", () => {
    assert.equal(normalizeText("done.Next,then"), "Done. Next, then");
  });

  it("only uppercases the first character", () => {
    assert.equal(normalizeText("iPhone sales are UP"), "IPhone sales are UP");
    assert.equal(normalizeText(""), "");
    assert.equal(normalizeText("   "), "");
  });
});

describe("applyPlan", () => {
  const rules = compileRuleSet({
    categories: [
      { category: "hedging", rules: [{ pattern: "\\bmaybe\\b", replacement: "", explanation: "Removes hedging", impact: 10 }] },
      { category: "weak_verbs", rules: [{ pattern: "\\bmight be\\b", replacement: "is", explanation: "Strengthens statement", impact: 15 }] },
      { category: "passive", rules: [{ pattern: "\\bwas \\w+ed by\\b", flag: true, explanation: "Passive", impact: 16 }] },
    ],
  });

  it("splices replacements and keeps original offsets", () => {
    const text = "maybe it might be fine";
    const { text: out, changes } = applyPlan(text, planEdits(collectMatches(text, rules)));
    assert.equal(out, " it is fine");
    assert.deepEqual(changes.map(c => [c.start, c.end, c.before, c.after]), [
      [0, 5, "maybe", REMOVED],
      [9, 17, "might be", "is"],
    ]);
    for (const c of changes) assert.equal(text.slice(c.start, c.end), c.before);
  });

  it("leaves flagged spans in place", () => {
    const text = "It was signed by Ana";
    const { text: out, changes } = applyPlan(text, planEdits(collectMatches(text, rules)));
    assert.equal(out, text);
    assert.equal(changes.length, 1);
    assert.equal(changes[0].change_type, "PASSIVE_FLAGGED");
    assert.equal(changes[0].before, "was signed by");
    assert.equal(changes[0].after, "was signed by");
  });

  it("returns the text untouched for an empty plan", () => {
    assert.deepEqual(applyPlan("nothing here", []), { text: "nothing here", changes: [] });
  });
});
