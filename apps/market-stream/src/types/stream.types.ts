import type { Decimal } from 'decimal.js';
import type {
  FtxFill,
  FtxOrder,
  FtxSubscriptionRequest,
  FtxTicker,
  FtxTrade,
} from '../schemas/ftx.schema';

export interface PriceLevel {
  readonly price: Decimal;
  readonly size: Decimal;
}

export type Channel = FtxSubscriptionRequest['channel'];
export type PrivateChannel = Extract<Channel, 'fills' | 'orders'>;
export type MarketChannel = Exclude<Channel, PrivateChannel>;

export const PRIVATE_CHANNELS: readonly PrivateChannel[] = ['fills', 'orders'];

export interface Subscription {
  channel: Channel;
  // Absent for the private channels
  market?: string;
}

export interface BookSnapshotEvent {
  kind: 'snapshot';
  market: string;
  bids: PriceLevel[];
  asks: PriceLevel[];
  checksum: number;
  time: Date;
}

export interface BookUpdateEvent {
  kind: 'update';
  market: string;
  bids: PriceLevel[];
  asks: PriceLevel[];
  checksum: number;
  time: Date;
}

export type BookEvent = BookSnapshotEvent | BookUpdateEvent;

export interface TradesEvent {
  kind: 'trades';
  market: string;
  trades: FtxTrade[];
}

export interface TickerEvent {
  kind: 'ticker';
  market: string;
  ticker: FtxTicker;
}

export interface FillEvent {
  kind: 'fill';
  fill: FtxFill;
}

export interface OrderUpdateEvent {
  kind: 'order';
  order: FtxOrder;
}

export type PrivateEvent = FillEvent | OrderUpdateEvent;

export interface HeartbeatEvent {
  kind: 'heartbeat';
}

export interface SubscriptionAckEvent {
  kind: 'subscribed' | 'unsubscribed';
  channel: Channel;
  market?: string;
}

export interface InfoEvent {
  kind: 'info';
  code?: number;
  message: string;
}

export interface ExchangeErrorEvent {
  kind: 'error';
  code?: number;
  message: string;
}

export interface UnknownEvent {
  kind: 'unknown';
  type: string;
  channel?: string;
  raw: string;
}

export interface MalformedEvent {
  kind: 'malformed';
  reason: string;
  raw: string;
}

// Closed set of everything the decoder can produce from one frame
export type StreamEvent =
  | BookEvent
  | TradesEvent
  | TickerEvent
  | PrivateEvent
  | HeartbeatEvent
  | SubscriptionAckEvent
  | InfoEvent
  | ExchangeErrorEvent
  | UnknownEvent
  | MalformedEvent;

// The part of a ws client the supervisor relies on
export interface StreamSocket {
  readonly readyState: number;
  send(data: string): void;
  close(): void;
  on(event: string, listener: (...args: never[]) => void): unknown;
}

export type SocketFactory = (url: string) => StreamSocket;
