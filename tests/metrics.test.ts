import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { coherenceMetrics, improvement } from "../lib/metrics";
import type { Report } from "../lib/schema";

const approx = (actual: number, expected: number) =>
  assert.ok(Math.abs(actual - expected) < 1e-9, `${actual} != ${expected}`);

function report(confidence_before: number, confidence_after: number): Report {
  return {
    original: "x", transformed: "x", changes: [],
    confidence_before, confidence_after,
    total_words_removed: 0, total_changes: 0,
  };
}

describe("coherenceMetrics", () => {
  it("calls a fully hedged input chaos", () => {
    const m = coherenceMetrics(report(0, 100));
    assert.equal(m.state, "chaos");
    approx(m.psi, 1);
    approx(m.delta, 1);
    approx(m.omega, 1);
    approx(m.conservation, 0);
    approx(m.efficiency, 0.5);
  });

  it("calls a mostly confident input that improved a transform", () => {
    const m = coherenceMetrics(report(80, 100));
    assert.equal(m.state, "transform");
    approx(m.psi, 0.2);
    approx(m.delta, 1);
    approx(m.improvement, 20);
    approx(m.improvement_pct, 25);
  });

  it("calls untouched confident text coherent", () => {
    const m = coherenceMetrics(report(100, 100));
    assert.equal(m.state, "coherent");
    approx(m.psi, 0);
    approx(m.delta, 0);
    approx(m.efficiency, 100);
  });
});

describe("improvement", () => {
  it("divides by at least one point", () => {
    assert.deepEqual(improvement({ confidence_before: 0, confidence_after: 40 }), { improvement: 40, improvement_pct: 4000 });
  });
});
