import {
  BadRequestException,
  Controller,
  Get,
  NotFoundException,
  Param,
  Query,
} from '@nestjs/common';
import { z } from 'zod';
import type { OrderBook } from './orderbook/order-book';
import type { PriceLevel } from './types/stream.types';
import { MarketStreamService } from './services/market-stream.service';
import { BookMetricsService } from './services/metrics.service';
import { OrderBookService } from './services/order-book.service';

const DEFAULT_DEPTH = 20;

const BookQuerySchema = z.object({
  depth: z.coerce.number().int().positive().max(1000).default(DEFAULT_DEPTH),
});

const QuoteQuerySchema = z.object({
  side: z.enum(['buy', 'sell']),
  size: z
    .string()
    .regex(/^\d+(\.\d+)?$/, 'must be a positive decimal')
    .refine((value) => Number(value) > 0, 'must be greater than zero'),
});

interface LevelView {
  price: string;
  size: string;
}

// Read-only view over the live books, for debugging and monitoring
@Controller()
export class AppController {
  constructor(
    private readonly marketStream: MarketStreamService,
    private readonly orderBooks: OrderBookService,
    private readonly metricsService: BookMetricsService,
  ) {}

  @Get('status')
  getStatus() {
    const status = this.marketStream.getStatus();
    return {
      ...status,
      malformedFrames: this.metricsService.getMalformedFrames(),
      books: this.orderBooks.getMarkets().map((market) => {
        const book = this.requireBook(market);
        return {
          market,
          state: book.state,
          sequence: book.sequence,
          bidLevels: book.depth('bids'),
          askLevels: book.depth('asks'),
          ...this.metricsService.getMarketMetrics(market),
        };
      }),
    };
  }

  @Get('books/:market')
  getBook(
    @Param('market') market: string,
    @Query() query: Record<string, unknown>,
  ) {
    const { depth } = parseQuery(BookQuerySchema, query);
    const book = this.requireBook(market);

    return {
      market: book.market,
      state: book.state,
      sequence: book.sequence,
      lastUpdateTime: book.lastUpdateTime?.toISOString() ?? null,
      checksum: book.checksum(),
      bestBid: toView(book.bestBid()),
      bestAsk: toView(book.bestAsk()),
      midPrice: book.midPrice()?.toString() ?? null,
      bids: book.levels('bids', depth).map((level) => toView(level)),
      asks: book.levels('asks', depth).map((level) => toView(level)),
    };
  }

  @Get('books/:market/quote')
  getQuote(
    @Param('market') market: string,
    @Query() query: Record<string, unknown>,
  ) {
    const { side, size } = parseQuery(QuoteQuerySchema, query);
    const book = this.requireBook(market);

    // null when the book cannot fill the size
    return {
      market: book.market,
      side,
      size,
      price: book.quote(side, size)?.toString() ?? null,
    };
  }

  private requireBook(market: string): OrderBook {
    const book = this.orderBooks.getBook(market);
    if (!book) {
      throw new NotFoundException(`Market ${market} is not tracked`);
    }
    return book;
  }
}

function parseQuery<T extends z.ZodTypeAny>(
  schema: T,
  query: Record<string, unknown>,
): z.output<T> {
  const result = schema.safeParse(query);
  if (!result.success) {
    throw new BadRequestException(
      result.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join(', '),
    );
  }
  return result.data;
}

function toView(level: PriceLevel): LevelView;
function toView(level: PriceLevel | undefined): LevelView | null;
function toView(level: PriceLevel | undefined): LevelView | null {
  return level
    ? { price: level.price.toString(), size: level.size.toString() }
    : null;
}
