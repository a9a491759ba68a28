import type { VercelRequest, VercelResponse } from "@vercel/node";
import { z } from "zod";
import { type Config, loadConfig } from "../lib/config";
import { type Engine, createEngine } from "../lib/engine";
import { countWords } from "../lib/score";
import { postToSheets } from "../lib/sheets";

const ScoreBody = z.object({ text: z.string() });

type ScoreOutput = { ok: true; score: number } | { ok: false; error: string };

export async function runScore(
  body: unknown,
  cfg: Config,
  engine: Engine = createEngine()
): Promise<{ status: number; payload: ScoreOutput }> {
  const parsed = ScoreBody.safeParse(body);
  if (!parsed.success) {
    return { status: 400, payload: { ok: false, error: "text (string) required" } };
  }
  const { text } = parsed.data;
  if (text.length > cfg.max_input_chars) {
    return { status: 413, payload: { ok: false, error: "text_too_long" } };
  }

  const score = engine.score(text);

  await postToSheets(cfg, "telemetry", {
    ts: new Date().toISOString(),
    words: countWords(text),
    score,
    meta: { source: "score" }
  });

  return { status: 200, payload: { ok: true, score } };
}

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (req.method !== "POST") return res.status(405).send("Use POST");
  try {
    const out = await runScore(req.body, loadConfig());
    return res.status(out.status).json(out.payload);
  } catch (e: unknown) {
    return res.status(500).json({ ok: false, error: e instanceof Error ? e.message : "internal error" });
  }
}
