import type { VercelRequest, VercelResponse } from "@vercel/node";
import { z } from "zod";
import { type Config, loadConfig } from "../lib/config";
import { type Engine, createEngine } from "../lib/engine";
import { coherenceMetrics } from "../lib/metrics";
import { postToSheets } from "../lib/sheets";
import type { CoherenceMetrics, Report } from "../lib/schema";

const TransformBody = z.object({
  text: z.string(),
  userId: z.string().optional(),
  sessionId: z.string().optional(),
});

type TransformOutput =
  | { ok: true; result: Report; metrics: CoherenceMetrics }
  | { ok: false; error: string };

export async function runTransform(
  body: unknown,
  cfg: Config,
  engine: Engine = createEngine()
): Promise<{ status: number; payload: TransformOutput }> {
  const parsed = TransformBody.safeParse(body);
  if (!parsed.success) {
    return { status: 400, payload: { ok: false, error: parsed.error.issues.map(i => `${i.path.join(".") || "body"}: ${i.message}`).join("; ") } };
  }
  const { text, userId = "", sessionId = "" } = parsed.data;
  if (text.length > cfg.max_input_chars) {
    return { status: 413, payload: { ok: false, error: "text_too_long" } };
  }

  const report = engine.transform(text);
  const metrics = coherenceMetrics(report);

  await postToSheets(cfg, "log", {
    userId, sessionId,
    input: report.original,
    output: report.transformed,
    confidence_before: report.confidence_before,
    confidence_after: report.confidence_after,
    total_changes: report.total_changes,
    meta: { source: "transform", state: metrics.state }
  });

  return { status: 200, payload: { ok: true, result: report, metrics } };
}

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (req.method !== "POST") return res.status(405).send("Use POST");
  try {
    const out = await runTransform(req.body, loadConfig());
    return res.status(out.status).json(out.payload);
  } catch (e: unknown) {
    return res.status(500).json({ ok: false, error: e instanceof Error ? e.message : "internal error" });
  }
}
