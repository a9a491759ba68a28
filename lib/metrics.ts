import type { CoherenceMetrics, ProcessingState, Report } from "./schema";

const clamp01 = (n: number) => Math.max(0, Math.min(1, n));

export function improvement(report: Pick<Report, "confidence_before" | "confidence_after">) {
  const delta = report.confidence_after - report.confidence_before;
  return { improvement: delta, improvement_pct: (delta / Math.max(report.confidence_before, 1)) * 100 };
}

// psi² + delta² ≈ omega² when the rewrite accounts for all of the chaos it found
export function coherenceMetrics(report: Report): CoherenceMetrics {
  const psi = (100 - report.confidence_before) / 100;
  const omega = report.confidence_after / 100;
  const delta = clamp01((psi - (1 - omega)) / Math.max(psi, 0.1));

  const expected = psi ** 2 + delta ** 2;
  const conservation = 1 - Math.abs(omega ** 2 - expected);
  const efficiency = omega ** 2 / Math.max(expected, 0.01);

  let state: ProcessingState = "coherent";
  if (psi > 0.6) state = "chaos";
  else if (delta > 0.3) state = "transform";

  return { psi, delta, omega, conservation, efficiency, state, ...improvement(report) };
}
