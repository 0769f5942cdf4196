import { z } from 'zod';
import { Decimal } from 'decimal.js';

const DECIMAL_PATTERN = /^-?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

// Numbers arrive either as JS numbers or, for long numerals, as the raw string kept by json-bigint
const DecimalSchema = z
  .union([z.string(), z.number()])
  .transform((value, ctx) => {
    const text = String(value).trim();
    if (!DECIMAL_PATTERN.test(text)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid decimal number: ${text}`,
      });
      return z.NEVER;
    }
    return new Decimal(text);
  });

// Exchange ids are 64-bit integers, keep them as strings
const IdSchema = z.union([z.string(), z.number()]).transform(String);

// Seconds since epoch with fraction, e.g. 1621740952.5079553
const EpochSecondsSchema = DecimalSchema.transform(
  (seconds) => new Date(seconds.times(1000).toNumber()),
);

const IsoTimestampSchema = z.string().transform((value, ctx) => {
  const millis = Date.parse(value);
  if (Number.isNaN(millis)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid timestamp: ${value}`,
    });
    return z.NEVER;
  }
  return new Date(millis);
});

const SideSchema = z.enum(['buy', 'sell']);

// [price, size]
const PriceLevelSchema = z
  .tuple([DecimalSchema, DecimalSchema])
  .transform(([price, size]) => ({ price, size }));

const ChecksumSchema = z.number().int().nonnegative().max(0xffffffff);

// Envelope shared by every inbound frame
const FrameSchema = z.object({
  type: z.string(),
  channel: z.string().optional(),
  market: z.string().optional(),
  code: z.number().optional(),
  msg: z.string().optional(),
  data: z.unknown().optional(),
});

const OrderbookDataSchema = z.object({
  action: z.enum(['partial', 'update']),
  bids: z.array(PriceLevelSchema),
  asks: z.array(PriceLevelSchema),
  checksum: ChecksumSchema,
  time: EpochSecondsSchema,
});

const TradeSchema = z.object({
  id: IdSchema,
  price: DecimalSchema,
  size: DecimalSchema,
  side: SideSchema,
  liquidation: z.boolean(),
  time: IsoTimestampSchema,
});

const TradesDataSchema = z.array(TradeSchema);

const TickerSchema = z.object({
  bid: DecimalSchema.nullable(),
  ask: DecimalSchema.nullable(),
  bidSize: DecimalSchema.nullable(),
  askSize: DecimalSchema.nullable(),
  last: DecimalSchema.nullable(),
  time: EpochSecondsSchema,
});

const FillSchema = z.object({
  id: IdSchema,
  market: z.string(),
  future: z.string().nullish(),
  baseCurrency: z.string().nullish(),
  quoteCurrency: z.string().nullish(),
  type: z.string(),
  side: SideSchema,
  price: DecimalSchema,
  size: DecimalSchema,
  orderId: IdSchema,
  tradeId: IdSchema,
  time: IsoTimestampSchema,
  fee: DecimalSchema,
  feeRate: DecimalSchema,
  feeCurrency: z.string(),
  liquidity: z.enum(['maker', 'taker']),
});

const ORDER_TYPE_ALIASES = {
  market: 'market',
  limit: 'limit',
  stop: 'stop',
  trailingStop: 'trailingStop',
  trailing_stop: 'trailingStop',
  takeProfit: 'takeProfit',
  take_profit: 'takeProfit',
} as const;

const OrderTypeSchema = z
  .enum([
    'market',
    'limit',
    'stop',
    'trailingStop',
    'trailing_stop',
    'takeProfit',
    'take_profit',
  ])
  .transform((value) => ORDER_TYPE_ALIASES[value]);

const OrderSchema = z.object({
  id: IdSchema,
  clientId: z.string().nullish(),
  market: z.string(),
  future: z.string().nullish(),
  type: OrderTypeSchema,
  side: SideSchema,
  // null for new market orders
  price: DecimalSchema.nullable(),
  size: DecimalSchema,
  status: z.enum(['new', 'open', 'closed']),
  filledSize: DecimalSchema,
  remainingSize: DecimalSchema,
  avgFillPrice: DecimalSchema.nullable(),
  reduceOnly: z.boolean(),
  ioc: z.boolean(),
  postOnly: z.boolean(),
  liquidation: z.boolean().nullish(),
  createdAt: IsoTimestampSchema,
});

// Outgoing subscription request
const SubscriptionRequestSchema = z.object({
  op: z.enum(['subscribe', 'unsubscribe']),
  channel: z.enum(['orderbook', 'trades', 'ticker', 'fills', 'orders']),
  market: z.string().optional(),
});

export {
  DecimalSchema,
  FrameSchema,
  OrderbookDataSchema,
  TradesDataSchema,
  TradeSchema,
  TickerSchema,
  FillSchema,
  OrderSchema,
  SubscriptionRequestSchema,
  SideSchema,
};

// Zod-inferred types - output side, after numbers became Decimals and timestamps Dates
export type FtxFrame = z.infer<typeof FrameSchema>;
export type FtxOrderbookData = z.infer<typeof OrderbookDataSchema>;
export type FtxTrade = z.infer<typeof TradeSchema>;
export type FtxTicker = z.infer<typeof TickerSchema>;
export type FtxFill = z.infer<typeof FillSchema>;
export type FtxOrder = z.infer<typeof OrderSchema>;
export type FtxSubscriptionRequest = z.infer<typeof SubscriptionRequestSchema>;
export type Side = z.infer<typeof SideSchema>;
