import { z } from 'zod';
import { Config, DeliveryModes, type DeliveryMode } from '@chat-quiz/shared-types';
import { LogLevels, type LogLevel } from '@chat-quiz/logger';

const optionalSetting = z.string().min(1).optional();

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(Config.server.port),
  TOKEN: z.string().min(1).default('MY_TEST_TOKEN'),
  DATA_DIR: z.string().min(1).default(Config.server.dataDir),
  DELIVERY_MODE: z.enum([DeliveryModes.SYNC, DeliveryModes.ASYNC]).default(DeliveryModes.ASYNC),
  GRAPH_API_URL: z.string().url().default(Config.delivery.graphApiUrl),
  LOG_LEVEL: z
    .string()
    .transform((level) => level.toUpperCase())
    .pipe(z.enum(LogLevels))
    .default('INFO'),
  AXIOM_TOKEN: optionalSetting,
  AXIOM_ORG_ID: optionalSetting,
  AXIOM_DATASET: optionalSetting,
});

export type ServerConfig = {
  port: number;
  /** Webhook verification token expected in `hub.verify_token`. */
  verifyToken: string;
  dataDir: string;
  deliveryMode: DeliveryMode;
  graphApiUrl: string;
  /** Validated logger settings, handed to `configureLogger`. */
  logging: {
    LOG_LEVEL: LogLevel;
    AXIOM_TOKEN?: string;
    AXIOM_ORG_ID?: string;
    AXIOM_DATASET?: string;
  };
};

/** Reads server settings from the environment. Throws ZodError on invalid values. */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = EnvSchema.parse(env);
  return {
    port: parsed.PORT,
    verifyToken: parsed.TOKEN,
    dataDir: parsed.DATA_DIR,
    deliveryMode: parsed.DELIVERY_MODE,
    graphApiUrl: parsed.GRAPH_API_URL.replace(/\/+$/, ''),
    logging: {
      LOG_LEVEL: parsed.LOG_LEVEL,
      AXIOM_TOKEN: parsed.AXIOM_TOKEN,
      AXIOM_ORG_ID: parsed.AXIOM_ORG_ID,
      AXIOM_DATASET: parsed.AXIOM_DATASET,
    },
  };
}
