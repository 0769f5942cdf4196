import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { STREAM_CONFIG, loadStreamConfig } from './config/stream.config';
import {
  MarketStreamService,
  SOCKET_FACTORY,
  createWebSocket,
} from './services/market-stream.service';
import { BookMetricsService } from './services/metrics.service';
import { OrderBookService } from './services/order-book.service';
import { PrivateStreamRouter } from './services/private-stream.router';
import { SubscriptionRegistry } from './services/subscription-registry.service';

@Module({
  imports: [],
  controllers: [AppController],
  providers: [
    { provide: STREAM_CONFIG, useFactory: () => loadStreamConfig() },
    { provide: SOCKET_FACTORY, useValue: createWebSocket },
    BookMetricsService,
    SubscriptionRegistry,
    OrderBookService,
    PrivateStreamRouter,
    MarketStreamService,
  ],
})
export class AppModule {}
