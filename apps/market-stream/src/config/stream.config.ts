import { z } from 'zod';
import type { PrivateChannel } from '../types/stream.types';

export const STREAM_CONFIG = Symbol('STREAM_CONFIG');

export const WS_ENDPOINTS = {
  com: 'wss://ftx.com/ws',
  us: 'wss://ftx.us/ws',
} as const;

const csv = z
  .string()
  .default('')
  .transform((value) =>
    value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0),
  );

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  PORT: positiveInt(4000),
  FTX_ENDPOINT: z.enum(['com', 'us']).default('com'),
  FTX_WS_URL: z.string().url().optional(),
  BOOK_MARKETS: csv,
  TRADE_MARKETS: csv,
  TICKER_MARKETS: csv,
  PRIVATE_CHANNELS: csv.pipe(z.array(z.enum(['fills', 'orders']))),
  PING_INTERVAL_MS: positiveInt(15_000),
  RECONNECT_DELAY_MS: z.coerce.number().int().nonnegative().default(5_000),
  MAX_RECONNECT_DELAY_MS: positiveInt(60_000),
  MAX_QUEUE_SIZE: positiveInt(1_000),
  CHECKSUM_DEPTH: positiveInt(100),
});

export interface StreamConfig {
  port: number;
  wsUrl: string;
  bookMarkets: string[];
  tradeMarkets: string[];
  tickerMarkets: string[];
  privateChannels: PrivateChannel[];
  pingIntervalMs: number;
  reconnectDelayMs: number;
  maxReconnectDelayMs: number;
  maxQueueSize: number;
  checksumDepth: number;
}

/**
 * Read the stream settings from environment variables.
 * Throws when a variable is present but invalid.
 */
export function loadStreamConfig(
  env: NodeJS.ProcessEnv = process.env,
): StreamConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new Error(`Invalid stream configuration: ${details}`);
  }

  const vars = result.data;
  return {
    port: vars.PORT,
    wsUrl: vars.FTX_WS_URL ?? WS_ENDPOINTS[vars.FTX_ENDPOINT],
    bookMarkets: vars.BOOK_MARKETS,
    tradeMarkets: vars.TRADE_MARKETS,
    tickerMarkets: vars.TICKER_MARKETS,
    privateChannels: vars.PRIVATE_CHANNELS,
    pingIntervalMs: vars.PING_INTERVAL_MS,
    reconnectDelayMs: vars.RECONNECT_DELAY_MS,
    maxReconnectDelayMs: Math.max(
      vars.MAX_RECONNECT_DELAY_MS,
      vars.RECONNECT_DELAY_MS,
    ),
    maxQueueSize: vars.MAX_QUEUE_SIZE,
    checksumDepth: vars.CHECKSUM_DEPTH,
  };
}
