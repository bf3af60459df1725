import type { JSONSchemaType } from "ajv";
import Ajv from "ajv";

export interface RuntimeConfig {
  /** In-memory databases when unset. */
  dataDir?: string;
  counterStore: "leveldb" | "redis";
  redisUrl: string;
  counterPersistMs: number;
  maxAttempts: number;
  storeTimeoutMs: number;
  reconcileBatchSize: number;
  monitorSampleSize: number;
  /** 0 turns the periodic check off. */
  monitorIntervalMs: number;
  driftThreshold: number;
  startupDelayMs: number;
  logChunkSize: number;
}

export const ENV_VARIABLES = {
  dataDir: "CHATSEQ_DATA_DIR",
  counterStore: "CHATSEQ_COUNTER_STORE",
  redisUrl: "CHATSEQ_REDIS_URL",
  counterPersistMs: "CHATSEQ_COUNTER_PERSIST_MS",
  maxAttempts: "CHATSEQ_MAX_ATTEMPTS",
  storeTimeoutMs: "CHATSEQ_STORE_TIMEOUT_MS",
  reconcileBatchSize: "CHATSEQ_RECONCILE_BATCH_SIZE",
  monitorSampleSize: "CHATSEQ_MONITOR_SAMPLE_SIZE",
  monitorIntervalMs: "CHATSEQ_MONITOR_INTERVAL_MS",
  driftThreshold: "CHATSEQ_DRIFT_THRESHOLD",
  startupDelayMs: "CHATSEQ_STARTUP_DELAY_MS",
  logChunkSize: "CHATSEQ_LOG_CHUNK_SIZE",
} as const satisfies Record<keyof RuntimeConfig, string>;

const configSchema: JSONSchemaType<RuntimeConfig> = {
  type: "object",
  properties: {
    dataDir: { type: "string", minLength: 1, nullable: true },
    counterStore: { type: "string", enum: ["leveldb", "redis"], default: "leveldb" },
    redisUrl: { type: "string", pattern: "^rediss?://", default: "redis://localhost:6379/0" },
    counterPersistMs: { type: "integer", minimum: 1, default: 1000 },
    maxAttempts: { type: "integer", minimum: 1, default: 5 },
    storeTimeoutMs: { type: "integer", minimum: 0, default: 2000 },
    reconcileBatchSize: { type: "integer", minimum: 1, default: 5 },
    monitorSampleSize: { type: "integer", minimum: 0, default: 10 },
    monitorIntervalMs: { type: "integer", minimum: 0, default: 30_000 },
    driftThreshold: { type: "integer", minimum: 1, default: 1 },
    startupDelayMs: { type: "integer", minimum: 0, default: 0 },
    logChunkSize: { type: "integer", minimum: 1, default: 50 },
  },
  required: [
    "counterStore",
    "redisUrl",
    "counterPersistMs",
    "maxAttempts",
    "storeTimeoutMs",
    "reconcileBatchSize",
    "monitorSampleSize",
    "monitorIntervalMs",
    "driftThreshold",
    "startupDelayMs",
    "logChunkSize",
  ],
  additionalProperties: false,
};

const validateConfig = new Ajv({
  allErrors: true,
  coerceTypes: true,
  useDefaults: true,
}).compile(configSchema);

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Reads `CHATSEQ_*` variables; empty values count as unset. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const raw: { [key: string]: unknown } = {};

  for (const [property, variable] of Object.entries(ENV_VARIABLES)) {
    const value = env[variable]?.trim();
    if (value) raw[property] = value;
  }

  if (!validateConfig(raw)) {
    const details = (validateConfig.errors ?? [])
      .map((error) => {
        const property = error.instancePath.slice(1);
        const variable = Object.entries(ENV_VARIABLES).find(([key]) => key === property)?.[1];
        return `${variable ?? property} ${error.message ?? "is invalid"}`;
      })
      .join(", ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  return raw;
}
