import "dotenv/config";

export type Config = {
  inventoryUrl: string;
  inventoryToken: string;
  inventoryTimeoutMs: number;
  databaseUrl: string;
  scheduleTime: string;
  cronExpr: string | null;
  timezone: string | undefined;
  maxOrdersPerRun: number;
  /** null: an order stays open until it is resolved or cancelled */
  cooldownDays: number | null;
  excludedStorageUnitPrefixes: string[];
  dispatchOrders: boolean;
  dispatchPriority: number;
  port: number;
  logLevel: string;
};

type Env = Record<string, string | undefined>;

function int(env: Env, key: string, fallback: number, min = 0): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const n = parseInt(raw, 10);
  if (!Number.isFinite(n) || n < min) {
    throw new Error(`${key} must be an integer >= ${min}, got "${raw}"`);
  }
  return n;
}

function list(raw: string | undefined): string[] {
  return (raw || "").split(",").map(s => s.trim()).filter(Boolean);
}

export function loadConfig(env: Env = process.env): Config {
  const cfg: Config = {
    inventoryUrl: (env.INVENTORY_API_URL || "").replace(/\/+$/, ""),
    inventoryToken: env.INVENTORY_API_TOKEN || "",
    inventoryTimeoutMs: int(env, "INVENTORY_TIMEOUT_MS", 30000, 1),
    databaseUrl: env.DATABASE_URL || "./cycle-count.db",
    scheduleTime: env.SCHEDULE_TIME || "02:00",
    cronExpr: env.CRON_EXPR?.trim() || null,
    timezone: env.TZ || undefined,
    maxOrdersPerRun: int(env, "MAX_ORDERS_PER_RUN", 200),
    cooldownDays: env.DEDUP_COOLDOWN_DAYS?.trim() ? int(env, "DEDUP_COOLDOWN_DAYS", 0, 1) : null,
    excludedStorageUnitPrefixes: list(env.EXCLUDED_STORAGE_UNIT_PREFIXES),
    dispatchOrders: (env.DISPATCH_ORDERS || "").trim().toLowerCase() === "true",
    dispatchPriority: int(env, "DISPATCH_PRIORITY", 3, 1),
    port: int(env, "PORT", 8080),
    logLevel: env.LOG_LEVEL || "info",
  };

  if (!cfg.inventoryUrl) {
    throw new Error("Missing INVENTORY_API_URL in .env");
  }
  if (!/^([01]?\d|2[0-3]):[0-5]\d$/.test(cfg.scheduleTime)) {
    throw new Error(`SCHEDULE_TIME must be HH:MM, got "${cfg.scheduleTime}"`);
  }
  return cfg;
}
