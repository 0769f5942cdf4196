import JSONbig from 'json-bigint';
import type { ZodError } from 'zod';
import {
  FillSchema,
  FrameSchema,
  OrderSchema,
  OrderbookDataSchema,
  SubscriptionRequestSchema,
  TickerSchema,
  TradesDataSchema,
  type FtxFrame,
} from '../schemas/ftx.schema';
import type { Channel, StreamEvent } from '../types/stream.types';

// storeAsString keeps numerals that do not fit a double as their original text
const JSONParser = JSONbig({ storeAsString: true });

const ChannelSchema = SubscriptionRequestSchema.shape.channel;

/**
 * Turn one websocket frame into exactly one event. Never throws: anything
 * that does not validate becomes a `malformed` event carrying the raw text,
 * and unrecognised type/channel combinations become `unknown`.
 */
export function decodeFrame(data: string | Buffer): StreamEvent {
  const raw = typeof data === 'string' ? data : data.toString('utf8');

  let parsed: unknown;
  try {
    parsed = JSONParser.parse(raw);
  } catch (error) {
    return malformed(`Invalid JSON: ${parseErrorMessage(error)}`, raw);
  }

  const frame = FrameSchema.safeParse(parsed);
  if (!frame.success) {
    return malformed(describeIssues(frame.error), raw);
  }

  return decodeEnvelope(frame.data, raw);
}

function decodeEnvelope(frame: FtxFrame, raw: string): StreamEvent {
  switch (frame.type) {
    case 'pong':
      return { kind: 'heartbeat' };
    case 'subscribed':
    case 'unsubscribed':
      return decodeAck(frame.type, frame, raw);
    case 'info':
      return { kind: 'info', code: frame.code, message: frame.msg ?? '' };
    case 'error':
      return { kind: 'error', code: frame.code, message: frame.msg ?? '' };
    case 'partial':
    case 'update':
      return decodeChannelData(frame, raw);
    default:
      return unknown(frame, raw);
  }
}

function decodeAck(
  kind: 'subscribed' | 'unsubscribed',
  frame: FtxFrame,
  raw: string,
): StreamEvent {
  const channel = ChannelSchema.safeParse(frame.channel);
  if (!channel.success) {
    return unknown(frame, raw);
  }
  return { kind, channel: channel.data, market: marketOf(channel.data, frame) };
}

function decodeChannelData(frame: FtxFrame, raw: string): StreamEvent {
  switch (frame.channel) {
    case 'orderbook': {
      if (!frame.market) {
        return malformed('Orderbook frame without market', raw);
      }
      const result = OrderbookDataSchema.safeParse(frame.data);
      if (!result.success) {
        return malformed(describeIssues(result.error), raw);
      }
      const { action, bids, asks, checksum, time } = result.data;
      if (action !== frame.type) {
        return malformed(
          `Orderbook action ${action} does not match frame type ${frame.type}`,
          raw,
        );
      }
      const book = { market: frame.market, bids, asks, checksum, time };
      return action === 'partial'
        ? { kind: 'snapshot', ...book }
        : { kind: 'update', ...book };
    }
    case 'trades': {
      if (!frame.market) {
        return malformed('Trades frame without market', raw);
      }
      const result = TradesDataSchema.safeParse(frame.data);
      if (!result.success) {
        return malformed(describeIssues(result.error), raw);
      }
      return { kind: 'trades', market: frame.market, trades: result.data };
    }
    case 'ticker': {
      if (!frame.market) {
        return malformed('Ticker frame without market', raw);
      }
      const result = TickerSchema.safeParse(frame.data);
      if (!result.success) {
        return malformed(describeIssues(result.error), raw);
      }
      return { kind: 'ticker', market: frame.market, ticker: result.data };
    }
    case 'fills': {
      const result = FillSchema.safeParse(frame.data);
      if (!result.success) {
        return malformed(describeIssues(result.error), raw);
      }
      return { kind: 'fill', fill: result.data };
    }
    case 'orders': {
      const result = OrderSchema.safeParse(frame.data);
      if (!result.success) {
        return malformed(describeIssues(result.error), raw);
      }
      return { kind: 'order', order: result.data };
    }
    default:
      return unknown(frame, raw);
  }
}

function marketOf(channel: Channel, frame: FtxFrame): string | undefined {
  if (channel === 'fills' || channel === 'orders') {
    return undefined;
  }
  return frame.market;
}

function unknown(frame: FtxFrame, raw: string): StreamEvent {
  return { kind: 'unknown', type: frame.type, channel: frame.channel, raw };
}

function malformed(reason: string, raw: string): StreamEvent {
  return { kind: 'malformed', reason, raw };
}

// json-bigint throws plain { name, message, at, text } objects
function parseErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (
    typeof error === 'object' &&
    error !== null &&
    'message' in error &&
    typeof error.message === 'string'
  ) {
    return error.message;
  }
  return String(error);
}

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message,
    )
    .join('; ');
}
