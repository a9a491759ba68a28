import type { Config } from "./config";

// Fire-and-report: a failed or slow post is logged, never thrown.
export async function postToSheets(
  cfg: Pick<Config, "sheets_url" | "sheets_api_key" | "sheets_timeout_ms">,
  op: string,
  payload: Record<string, unknown>
): Promise<void> {
  if (!cfg.sheets_url) return;
  try {
    const r = await fetch(cfg.sheets_url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ op, apiKey: cfg.sheets_api_key, ...payload }),
      signal: AbortSignal.timeout(cfg.sheets_timeout_ms),
    });
    if (!r.ok) console.warn(`[sheets] ${op} failed: HTTP ${r.status}`);
  } catch (e: unknown) {
    console.warn(`[sheets] ${op} failed: ${e instanceof Error ? e.message : String(e)}`);
  }
}
