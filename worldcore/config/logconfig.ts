//worldcore/config/logconfig.ts

export type LogLevel = "debug" | "info" | "warn" | "error";

const ORDER: LogLevel[] = ["debug", "info", "warn", "error"];

function parseLevel(raw: string | undefined | null): LogLevel | null {
  if (!raw) return null;
  const v = raw.toLowerCase();
  if (v === "debug" || v === "info" || v === "warn" || v === "error") {
    return v;
  }
  return null;
}

// Per-scope defaults (can be overridden by env per scope)
const PER_SCOPE_DEFAULTS: Record<string, LogLevel> = {
  ELECTION: "info",
  COMBAT_DETECT: "info",
  WAVE: "info",
  LIFECYCLE: "info",
  REINFORCE: "info",
  NOTIFY: "info",

  CALLQUEUE: "warn",
  EVENT: "warn",
};

// Read lazily so tests and the harness can set LOG_LEVEL after import.
function globalLevel(): LogLevel {
  return parseLevel(process.env.LOG_LEVEL) ?? "info";
}

// Allow env overrides like LOG_SCOPE_WAVE=debug, LOG_SCOPE_ELECTION=warn, etc.
function getScopeLevel(scope: string): LogLevel {
  const key = scope.toUpperCase();

  // 1) Explicit per-scope env override
  const fromEnv = parseLevel(process.env[`LOG_SCOPE_${key}`]);
  if (fromEnv) return fromEnv;

  // 2) Global env level beats the table when set explicitly
  const fromGlobal = parseLevel(process.env.LOG_LEVEL);
  if (fromGlobal) return fromGlobal;

  // 3) Default table, then fallback
  return PER_SCOPE_DEFAULTS[key] ?? globalLevel();
}

export function logEnabled(scope: string, level: LogLevel): boolean {
  const wantedIdx = ORDER.indexOf(getScopeLevel(scope));
  const levelIdx = ORDER.indexOf(level);
  return levelIdx >= wantedIdx;
}
