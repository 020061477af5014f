import { Axiom } from '@axiomhq/js';

export const LogLevels = ["DEBUG", "INFO", "WARN", "ERROR"] as const;

export type LogLevel = (typeof LogLevels)[number];

export interface LogMeta {
  layer: "ENGINE" | "SERVER" | "DEFINITIONS" | "DELIVERY" | "SIMULATOR";
  gameId?: number;
  channelId?: string;
  playerId?: string;
  [key: string]: unknown;
}

export interface LoggerEnv {
  AXIOM_TOKEN?: string;
  AXIOM_ORG_ID?: string;
  AXIOM_DATASET?: string;
  LOG_LEVEL?: string;
}

const DEFAULT_DATASET = "chat-quiz";

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
};

// Internal cache for Axiom client to avoid re-initializing
let axiomClient: Axiom | null = null;

let defaultEnv: LoggerEnv = process.env;

/**
 * Replaces the environment `log` reads when called without one.
 * Entrypoints pass their validated settings here at startup.
 */
export function configureLogger(env: LoggerEnv) {
  defaultEnv = env;
}

function getAxiom(env: LoggerEnv) {
  const token = env.AXIOM_TOKEN;
  if (!axiomClient && token) {
    axiomClient = new Axiom({
      token,
      orgId: env.AXIOM_ORG_ID,
    });
  }
  return axiomClient;
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function thresholdFor(env: LoggerEnv): number {
  const configured = env.LOG_LEVEL?.toUpperCase();
  return configured && isLogLevel(configured) ? LEVEL_ORDER[configured] : LEVEL_ORDER.INFO;
}

/**
 * Structured Logging Utility.
 * Writes one JSON object per line to the console and, when AXIOM_TOKEN is
 * configured, queues the same payload for Axiom ingestion.
 *
 * @param env - Defaults to the configured environment (process.env until
 *   `configureLogger` is called); tests pass their own.
 */
export function log(
  level: LogLevel,
  message: string,
  meta: LogMeta,
  env: LoggerEnv = defaultEnv,
) {
  if (LEVEL_ORDER[level] < thresholdFor(env)) return;

  const timestamp = new Date().toISOString();
  const payload = { timestamp, level, message, ...meta };

  // ERROR/WARN go to stderr so they stand out from request noise
  if (level === "ERROR" || level === "WARN") {
    console.error(JSON.stringify(payload));
  } else {
    console.log(JSON.stringify(payload));
  }

  const axiom = getAxiom(env);
  if (axiom) {
    axiom.ingest(env.AXIOM_DATASET || DEFAULT_DATASET, [payload]);
  }
}

/** Drain queued Axiom events. Call before the process exits. */
export async function flushLogs(): Promise<void> {
  if (!axiomClient) return;
  try {
    await axiomClient.flush();
  } catch (err) {
    console.error("Failed to ship logs to Axiom", err);
  }
}

/** Normalize an unknown thrown value for a log payload. */
export function describeError(err: unknown): { error: string; stack?: string } {
  if (err instanceof Error) {
    return { error: err.message, stack: err.stack };
  }
  return { error: String(err) };
}
