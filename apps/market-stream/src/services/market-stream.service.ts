import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import WebSocket from 'ws';
import { EventEmitter } from 'events';
import { STREAM_CONFIG, type StreamConfig } from '../config/stream.config';
import { decodeFrame } from '../decoder/message-decoder';
import type { FtxSubscriptionRequest } from '../schemas/ftx.schema';
import type {
  BookEvent,
  Channel,
  InfoEvent,
  SocketFactory,
  StreamEvent,
  StreamSocket,
  Subscription,
} from '../types/stream.types';
import { BookMetricsService } from './metrics.service';
import { OrderBookService } from './order-book.service';
import { PrivateStreamRouter } from './private-stream.router';
import {
  SubscriptionRegistry,
  isPrivateChannel,
} from './subscription-registry.service';

export const SOCKET_FACTORY = Symbol('SOCKET_FACTORY');

export const createWebSocket: SocketFactory = (url) => new WebSocket(url);

interface QueuedBookEvent {
  event: BookEvent;
  // Connection the event arrived on
  epoch: number;
}

// Where a market is in its way back to a trusted book:
// resubscribing waits for the re-subscribe confirmation, awaiting-snapshot for the fresh partial,
// backoff for the retry timer after a snapshot failed its own checksum
type ResyncPhase = 'resubscribing' | 'awaiting-snapshot' | 'backoff';

export interface StreamStatus {
  connected: boolean;
  epoch: number;
  reconnectAttempts: number;
  desiredSubscriptions: Subscription[];
  resyncingMarkets: string[];
}

// Info code the exchange sends before restarting its servers
const SERVER_RESTART_CODE = 20001;

// This service owns the exchange connection: heartbeat, reconnects, subscription replay,
// and the ordered handoff of book frames to the order books.
// Book frames are queued per market so each market is applied strictly in wire order,
// and every queued frame remembers the connection it came from so nothing from an old
// connection is applied after a reconnect.
@Injectable()
export class MarketStreamService
  extends EventEmitter
  implements OnModuleInit, OnModuleDestroy
{
  private readonly logger = new Logger(MarketStreamService.name);
  private ws: StreamSocket | null = null;
  // Bumped whenever a connection opens or closes
  private epoch = 0;
  private reconnectAttempts = 0;
  private isConnecting = false;
  private isShuttingDown = false;
  private reconnectTimeout: NodeJS.Timeout | null = null;
  private pingInterval: NodeJS.Timeout | null = null;

  // Queue system for ordered book processing
  private readonly marketQueues = new Map<string, QueuedBookEvent[]>();
  private readonly processingQueues = new Set<string>();
  private readonly resyncing = new Map<string, ResyncPhase>();
  private readonly resyncTimers = new Map<string, NodeJS.Timeout>();
  // Consecutive snapshots that failed their own checksum, per market
  private readonly snapshotFailures = new Map<string, number>();

  constructor(
    @Inject(STREAM_CONFIG) private readonly config: StreamConfig,
    @Inject(SOCKET_FACTORY) private readonly socketFactory: SocketFactory,
    private readonly registry: SubscriptionRegistry,
    private readonly orderBooks: OrderBookService,
    private readonly privateRouter: PrivateStreamRouter,
    private readonly metricsService: BookMetricsService,
  ) {
    super();
  }

  onModuleInit() {
    for (const market of this.config.bookMarkets) {
      this.registerSubscription('orderbook', market);
    }
    for (const market of this.config.tradeMarkets) {
      this.registerSubscription('trades', market);
    }
    for (const market of this.config.tickerMarkets) {
      this.registerSubscription('ticker', market);
    }
    for (const channel of this.config.privateChannels) {
      this.registerSubscription(channel);
    }

    this.logger.log('Initializing exchange WebSocket connection...');
    this.connect();
  }

  onModuleDestroy() {
    this.logger.log('Destroying exchange WebSocket connection...');
    this.isShuttingDown = true;
    if (this.reconnectTimeout) {
      clearTimeout(this.reconnectTimeout);
      this.reconnectTimeout = null;
    }
    this.disconnect();
  }

  /**
   * Subscribe to a channel. Market channels need a market, private ones ignore it.
   */
  subscribe(channel: Channel, market?: string): void {
    if (!isPrivateChannel(channel) && !market) {
      throw new Error(`Channel ${channel} requires a market`);
    }
    if (this.registerSubscription(channel, market)) {
      this.reconcile();
    }
  }

  unsubscribe(channel: Channel, market?: string): void {
    if (!this.registry.unsubscribe(channel, market)) {
      this.logger.debug(`Not subscribed to ${channel} ${market ?? ''}`);
      return;
    }

    if (channel === 'orderbook' && market) {
      this.dropQueue(market);
      this.clearResync(market);
      this.snapshotFailures.delete(market);
      this.orderBooks.untrack(market);
    }

    this.reconcile();
  }

  /**
   * Throw away a market's book and ask the exchange for a fresh snapshot
   * by cycling its orderbook subscription.
   */
  resync(market: string): void {
    if (this.resyncing.has(market)) {
      this.logger.debug(`Already resyncing ${market}, skipping duplicate resync`);
      return;
    }
    if (!this.registry.isDesired('orderbook', market)) {
      return;
    }

    this.logger.log(`Resyncing market: ${market}`);
    this.resyncing.set(market, 'resubscribing');
    this.metricsService.recordResync(market);

    this.dropQueue(market);
    this.orderBooks.invalidate(market);
    this.registry.markStale('orderbook', market);
    this.emit('resync', market);

    this.reconcile();
  }

  isConnected(): boolean {
    return this.ws !== null && this.ws.readyState === WebSocket.OPEN;
  }

  getStatus(): StreamStatus {
    return {
      connected: this.isConnected(),
      epoch: this.epoch,
      reconnectAttempts: this.reconnectAttempts,
      desiredSubscriptions: this.registry.desiredState(),
      resyncingMarkets: [...this.resyncing.keys()].sort(),
    };
  }

  /**
   * Abandon whatever resync is in progress and start a new one
   */
  private restartResync(market: string): void {
    this.clearResync(market);
    this.resync(market);
  }

  private clearResync(market: string): void {
    const timer = this.resyncTimers.get(market);
    if (timer) {
      clearTimeout(timer);
      this.resyncTimers.delete(market);
    }
    this.resyncing.delete(market);
  }

  private registerSubscription(channel: Channel, market?: string): boolean {
    const added = this.registry.subscribe(channel, market);
    if (channel === 'orderbook' && market) {
      this.orderBooks.track(market);
    }
    return added;
  }

  private connect(): void {
    if (this.isConnecting || this.ws) {
      this.logger.warn('Already connected or connecting, skipping...');
      return;
    }

    this.isConnecting = true;
    this.logger.log(`Attempting to connect to ${this.config.wsUrl}...`);

    let socket: StreamSocket;
    try {
      socket = this.socketFactory(this.config.wsUrl);
    } catch (error) {
      this.isConnecting = false;
      this.logger.error(
        `Failed to create WebSocket: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
      this.scheduleReconnect();
      return;
    }

    this.ws = socket;

    socket.on('open', () => this.handleOpen(socket));
    socket.on('message', (data: WebSocket.RawData | string) =>
      this.handleMessage(socket, data),
    );
    socket.on('close', (code: number, reason: Buffer | string) =>
      this.handleClose(socket, code, reason.toString()),
    );
    socket.on('error', (error: Error) => {
      // ws follows every error with a close event, reconnecting happens there
      if (socket === this.ws) {
        this.logger.error(`Exchange WebSocket error: ${error.message}`);
      }
    });
  }

  private disconnect(): void {
    const socket = this.ws;
    if (!socket) {
      return;
    }

    this.ws = null;
    this.isConnecting = false;
    try {
      socket.close();
    } catch (error) {
      this.logger.warn(
        `Error closing WebSocket: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    }
    this.resetConnectionState();
    this.emit('disconnected', 1000, 'Manual disconnect');
  }

  private handleOpen(socket: StreamSocket): void {
    if (socket !== this.ws) {
      return;
    }

    this.isConnecting = false;
    this.reconnectAttempts = 0;
    this.epoch++;
    this.registry.resetConnection();
    this.logger.log('Connected to exchange WebSocket');

    this.startPing();
    this.emit('connected');

    const desired = this.registry.desiredState();
    if (desired.length > 0) {
      this.logger.log(`Replaying ${desired.length} subscriptions`);
    }
    this.reconcile();
  }

  private handleClose(socket: StreamSocket, code: number, reason: string): void {
    if (socket !== this.ws) {
      return;
    }

    this.logger.warn(
      `Exchange WebSocket closed. Code: ${code}, Reason: ${reason}`,
    );
    this.ws = null;
    this.isConnecting = false;
    this.resetConnectionState();
    this.emit('disconnected', code, reason);

    if (!this.isShuttingDown) {
      this.scheduleReconnect();
    }
  }

  /**
   * Everything tied to the old socket is void: queued frames, resyncs in
   * progress, book contents and subscription confirmations.
   */
  private resetConnectionState(): void {
    this.stopPing();
    this.epoch++;

    for (const queue of this.marketQueues.values()) {
      queue.length = 0;
    }
    this.marketQueues.clear();
    for (const timer of this.resyncTimers.values()) {
      clearTimeout(timer);
    }
    this.resyncTimers.clear();
    this.resyncing.clear();
    this.snapshotFailures.clear();

    this.orderBooks.invalidateAll();
    this.registry.resetConnection();
  }

  private scheduleReconnect(): void {
    if (this.reconnectTimeout) {
      clearTimeout(this.reconnectTimeout);
      this.reconnectTimeout = null;
    }

    const delay = Math.min(
      this.config.maxReconnectDelayMs,
      this.config.reconnectDelayMs * 2 ** this.reconnectAttempts,
    );
    this.reconnectAttempts++;

    this.logger.log(
      `Reconnect attempt ${this.reconnectAttempts} scheduled in ${delay}ms`,
    );
    this.reconnectTimeout = setTimeout(() => {
      this.reconnectTimeout = null;
      this.connect();
    }, delay);
  }

  /**
   * Drop the current socket and connect again right away
   */
  private restartConnection(reason: string): void {
    this.logger.warn(`Restarting exchange WebSocket connection: ${reason}`);
    this.disconnect();
    this.reconnectAttempts = 0;
    this.scheduleReconnect();
  }

  private startPing(): void {
    this.stopPing();
    this.pingInterval = setInterval(() => {
      this.send({ op: 'ping' });
    }, this.config.pingIntervalMs);
  }

  private stopPing(): void {
    if (this.pingInterval) {
      clearInterval(this.pingInterval);
      this.pingInterval = null;
    }
  }

  private send(frame: FtxSubscriptionRequest | { op: 'ping' }): boolean {
    if (!this.ws || this.ws.readyState !== WebSocket.OPEN) {
      this.logger.warn(
        `WebSocket not connected, cannot send ${frame.op}. Connection state: ${this.ws ? this.ws.readyState : 'null'}`,
      );
      return false;
    }

    try {
      this.ws.send(JSON.stringify(frame));
      return true;
    } catch (error) {
      this.logger.error(
        `Failed to send ${frame.op}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
      return false;
    }
  }

  /**
   * Send whatever the registry says is missing on this connection
   */
  private reconcile(): void {
    if (!this.isConnected()) {
      return;
    }

    const { subscribe, unsubscribe } = this.registry.pendingActions();
    for (const subscription of unsubscribe) {
      this.sendSubscription('unsubscribe', subscription);
    }
    for (const subscription of subscribe) {
      this.sendSubscription('subscribe', subscription);
    }
  }

  private sendSubscription(
    op: 'subscribe' | 'unsubscribe',
    { channel, market }: Subscription,
  ): void {
    const request: FtxSubscriptionRequest =
      market === undefined ? { op, channel } : { op, channel, market };

    if (this.send(request)) {
      this.registry.markRequested(op, channel, market);
      this.logger.debug(`Sent ${op} for ${channel} ${market ?? ''}`);
    }
  }

  private handleMessage(
    socket: StreamSocket,
    data: WebSocket.RawData | string,
  ): void {
    if (socket !== this.ws) {
      return;
    }
    this.handleEvent(decodeFrame(rawDataToString(data)));
  }

  private handleEvent(event: StreamEvent): void {
    switch (event.kind) {
      case 'snapshot':
      case 'update':
        this.enqueueBookEvent(event);
        return;
      case 'trades':
        this.emit('trades', event);
        return;
      case 'ticker':
        this.emit('ticker', event);
        return;
      case 'fill':
      case 'order':
        this.privateRouter.dispatch(event);
        return;
      case 'subscribed':
      case 'unsubscribed':
        this.logger.log(
          `Subscription status: ${event.kind} ${event.channel} ${event.market ?? ''}`,
        );
        this.registry.acknowledge(event.kind, event.channel, event.market);
        if (event.kind === 'subscribed' && event.channel === 'orderbook') {
          this.handleBookSubscribed(event.market);
        }
        this.reconcile();
        return;
      case 'heartbeat':
        this.logger.debug('pong');
        return;
      case 'info':
        this.handleInfo(event);
        return;
      case 'error':
        this.logger.error(
          `Exchange error${event.code === undefined ? '' : ` ${event.code}`}: ${event.message}`,
        );
        return;
      case 'unknown':
        this.logger.debug(
          `Unknown message type=${event.type} channel=${event.channel ?? 'none'}`,
        );
        this.emit('unknown', event);
        return;
      case 'malformed':
        this.metricsService.recordMalformedFrame();
        this.logger.warn(
          `Dropped malformed frame: ${event.reason}`,
          event.raw.substring(0, 500),
        );
        return;
    }
  }

  private handleInfo(event: InfoEvent): void {
    this.logger.log(`Exchange info ${event.code ?? ''}: ${event.message}`);
    if (event.code === SERVER_RESTART_CODE) {
      this.restartConnection('exchange is restarting');
    }
  }

  /**
   * The exchange sends the fresh partial right after confirming a subscribe,
   * so everything still queued for the market belongs to the old subscription
   */
  private handleBookSubscribed(market: string | undefined): void {
    if (market && this.resyncing.get(market) === 'resubscribing') {
      this.dropQueue(market);
      this.resyncing.set(market, 'awaiting-snapshot');
    }
  }

  private enqueueBookEvent(event: BookEvent): void {
    const market = event.market;

    if (!this.registry.isDesired('orderbook', market)) {
      this.logger.debug(`Ignoring ${event.kind} for unsubscribed ${market}`);
      return;
    }

    const queue = this.marketQueues.get(market) ?? [];
    this.marketQueues.set(market, queue);

    if (queue.length >= this.config.maxQueueSize) {
      if (event.kind === 'snapshot') {
        // Everything queued is superseded by the new snapshot
        queue.length = 0;
      } else if (this.resyncing.has(market)) {
        discardDiffsBeforeSnapshot(queue);
      }
    }

    // Dropping a diff would corrupt the book, start over instead
    if (queue.length >= this.config.maxQueueSize) {
      this.logger.warn(
        `Queue for ${market} is full (${this.config.maxQueueSize}), resyncing`,
      );
      this.restartResync(market);
      return;
    }

    queue.push({ event, epoch: this.epoch });
    this.scheduleDrain(market);
  }

  private dropQueue(market: string): void {
    const queue = this.marketQueues.get(market);
    if (queue) {
      queue.length = 0;
      this.marketQueues.delete(market);
    }
  }

  private scheduleDrain(market: string): void {
    if (this.processingQueues.has(market)) {
      return;
    }
    setImmediate(() => {
      void this.processMarketQueue(market);
    });
  }

  /**
   * Apply queued frames for a market in order, yielding to the event loop between frames
   */
  private async processMarketQueue(market: string): Promise<void> {
    if (this.processingQueues.has(market)) {
      return;
    }

    this.processingQueues.add(market);
    const queue = this.marketQueues.get(market);

    try {
      while (queue && queue.length > 0) {
        const item = queue.shift();
        if (!item || item.epoch !== this.epoch) {
          continue;
        }

        try {
          this.applyBookEvent(item.event);
        } catch (error) {
          this.logger.error(
            `Error processing ${item.event.kind} for ${market}: ${error instanceof Error ? error.message : 'Unknown error'}`,
          );
        }

        if (queue.length > 0) {
          await new Promise<void>((resolve) => setImmediate(resolve));
        }
      }
    } finally {
      this.processingQueues.delete(market);
    }

    // The queue may have been replaced while this one was draining
    const current = this.marketQueues.get(market);
    if (current && current !== queue && current.length > 0) {
      this.scheduleDrain(market);
    }
  }

  /**
   * Cycle the subscription again after a backoff once a snapshot fails its
   * own checksum. The delay doubles per consecutive failure.
   */
  private retryAfterBadSnapshot(market: string): void {
    const failures = (this.snapshotFailures.get(market) ?? 0) + 1;
    this.snapshotFailures.set(market, failures);

    const delay = Math.min(
      this.config.maxReconnectDelayMs,
      this.config.reconnectDelayMs * 2 ** (failures - 1),
    );
    this.logger.warn(
      `Snapshot for ${market} failed its checksum ${failures} time(s), resyncing in ${delay}ms`,
    );

    this.clearResync(market);
    this.dropQueue(market);
    this.orderBooks.invalidate(market);
    this.resyncing.set(market, 'backoff');
    this.resyncTimers.set(
      market,
      setTimeout(() => this.restartResync(market), delay),
    );
  }

  private applyBookEvent(event: BookEvent): void {
    const market = event.market;
    const outcome = this.orderBooks.apply(event);

    switch (outcome) {
      case 'applied':
        if (event.kind === 'snapshot') {
          this.snapshotFailures.delete(market);
          if (this.resyncing.has(market)) {
            this.clearResync(market);
            this.logger.log(`Market ${market} resynced`);
          }
        }
        return;
      case 'checksum-mismatch':
        if (event.kind === 'snapshot') {
          this.retryAfterBadSnapshot(market);
        } else {
          this.restartResync(market);
        }
        return;
      case 'out-of-sequence': {
        // Before the re-subscribe is confirmed diffs from the old subscription are expected
        const phase = this.resyncing.get(market);
        if (phase === undefined || phase === 'awaiting-snapshot') {
          this.logger.warn(
            `Received update for ${market} before its snapshot, resyncing`,
          );
          this.restartResync(market);
        }
        return;
      }
      case 'malformed':
      case 'untracked':
        return;
    }
  }
}

// Diffs ahead of the first queued snapshot have nothing to apply to
function discardDiffsBeforeSnapshot(queue: QueuedBookEvent[]): void {
  const firstSnapshot = queue.findIndex(
    (item) => item.event.kind === 'snapshot',
  );
  queue.splice(0, firstSnapshot === -1 ? queue.length : firstSnapshot);
}

function rawDataToString(data: WebSocket.RawData | string): string {
  if (typeof data === 'string') {
    return data;
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}
