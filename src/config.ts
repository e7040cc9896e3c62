function parseNumber(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export const config = {
  host: process.env.HOST ?? "127.0.0.1",
  port: parseNumber(process.env.PORT, 8787),
  agentsDir: process.env.AGENTS_DIR ?? "./data/agents",
  settingsPath: process.env.SETTINGS_PATH ?? "./data/config.json",
  shutdownGraceMs: parseNumber(process.env.SHUTDOWN_GRACE_MS, 10000),
};
