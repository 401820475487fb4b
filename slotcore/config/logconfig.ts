//slotcore/config/logconfig.ts

export type LogLevel = "debug" | "info" | "warn" | "error";

const ORDER: LogLevel[] = ["debug", "info", "warn", "error"];

export function parseLevel(raw: string | undefined | null): LogLevel | null {
  if (!raw) return null;
  const v = raw.toLowerCase();
  if (v === "debug" || v === "info" || v === "warn" || v === "error") {
    return v;
  }
  return null;
}

// LOG_SCOPE_INVENTORY=debug etc. wins, then LOG_LEVEL, then "info".
// Read on every call so tests can flip levels through process.env.
function getScopeLevel(scope: string): LogLevel {
  const fromScope = parseLevel(process.env[`LOG_SCOPE_${scope.toUpperCase()}`]);
  if (fromScope) return fromScope;

  return parseLevel(process.env.LOG_LEVEL) ?? "info";
}

export function logEnabled(scope: string, level: LogLevel): boolean {
  const wantedIdx = ORDER.indexOf(getScopeLevel(scope));
  const levelIdx = ORDER.indexOf(level);
  return levelIdx >= wantedIdx;
}
