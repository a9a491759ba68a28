export type Config = {
  sheets_url: string;        // default "" (logging off)
  sheets_api_key: string;    // default ""
  sheets_timeout_ms: number; // default 3000
  max_input_chars: number;   // default 20000
};

function parseNumber(x: unknown, dflt: number) {
  const n = Number(x);
  return Number.isFinite(n) && n > 0 ? n : dflt;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides?: Partial<Config>): Config {
  return {
    sheets_url: overrides?.sheets_url ?? env.SHEETS_WEBHOOK_URL ?? "",
    sheets_api_key: overrides?.sheets_api_key ?? env.SHEETS_API_KEY ?? "",
    sheets_timeout_ms: overrides?.sheets_timeout_ms ?? parseNumber(env.SHEETS_TIMEOUT_MS, 3000),
    max_input_chars: overrides?.max_input_chars ?? parseNumber(env.MAX_INPUT_CHARS, 20000),
  };
}
