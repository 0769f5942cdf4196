import { Injectable, Logger } from '@nestjs/common';

interface UpdateBucket {
  timestamp: number;
  count: number;
}

export interface MarketCounters {
  checksumMismatches: number;
  resyncs: number;
}

export interface MarketMetrics extends MarketCounters {
  updatesPerMinute: number;
}

// Tracks book activity per market: a rolling one-minute window of applied
// frames plus counters for checksum mismatches and resyncs
@Injectable()
export class BookMetricsService {
  private readonly logger = new Logger(BookMetricsService.name);
  private readonly buckets = new Map<string, UpdateBucket[]>();
  private readonly counters = new Map<string, MarketCounters>();
  private malformedFrames = 0;
  private readonly BUCKET_SIZE_MS = 1000; // 1 second
  private readonly WINDOW_SIZE_MS = 60 * 1000; // 60 seconds

  /**
   * Count one applied snapshot or diff for a market
   */
  recordUpdate(market: string): void {
    const now = Date.now();
    const bucketIndex = Math.floor(now / this.BUCKET_SIZE_MS);

    const marketBuckets = this.buckets.get(market) ?? [];
    this.buckets.set(market, marketBuckets);

    let currentBucket = marketBuckets.find(
      (b) => Math.floor(b.timestamp / this.BUCKET_SIZE_MS) === bucketIndex,
    );
    if (!currentBucket) {
      currentBucket = { timestamp: now, count: 0 };
      marketBuckets.push(currentBucket);
    }

    currentBucket.count++;

    this.cleanupOldBuckets(market);
  }

  recordChecksumMismatch(market: string): void {
    this.countersFor(market).checksumMismatches++;
  }

  recordResync(market: string): void {
    this.countersFor(market).resyncs++;
  }

  recordMalformedFrame(): void {
    this.malformedFrames++;
  }

  getMalformedFrames(): number {
    return this.malformedFrames;
  }

  /**
   * Rolling count of applied frames over the last minute
   */
  getUpdatesPerMinute(market: string): number {
    this.cleanupOldBuckets(market);

    const marketBuckets = this.buckets.get(market);
    if (!marketBuckets) {
      return 0;
    }

    return marketBuckets.reduce((sum, bucket) => sum + bucket.count, 0);
  }

  getMarketMetrics(market: string): MarketMetrics {
    return {
      updatesPerMinute: this.getUpdatesPerMinute(market),
      ...this.countersFor(market),
    };
  }

  /**
   * Forget a market, e.g. after it was unsubscribed
   */
  removeMarket(market: string): void {
    this.buckets.delete(market);
    this.counters.delete(market);
    this.logger.debug(`Removed metrics for market: ${market}`);
  }

  private countersFor(market: string): MarketCounters {
    let counters = this.counters.get(market);
    if (!counters) {
      counters = { checksumMismatches: 0, resyncs: 0 };
      this.counters.set(market, counters);
    }
    return counters;
  }

  /**
   * Clean up buckets older than the window size
   */
  private cleanupOldBuckets(market: string): void {
    const cutoff = Date.now() - this.WINDOW_SIZE_MS;

    const marketBuckets = this.buckets.get(market);
    if (!marketBuckets) {
      return;
    }

    this.buckets.set(
      market,
      marketBuckets.filter((bucket) => bucket.timestamp > cutoff),
    );
  }
}
