import crc32 from 'buffer-crc32';
import { Decimal } from 'decimal.js';
import type { PriceLevel } from '../types/stream.types';

// Levels per side the exchange includes in its checksum
export const CHECKSUM_DEPTH = 100;

const EXPONENT_THRESHOLD = new Decimal('0.0001');
const LARGE_EXPONENT_THRESHOLD = new Decimal('1e16');

/**
 * Render a number the way the exchange does when it builds the checksum
 * (Python's str(float)):
 * - whole numbers keep one decimal: 35000 -> "35000.0"
 * - magnitudes below 1e-4 use a two-digit signed exponent: 0.00009 -> "9e-05"
 * - magnitudes of 1e16 and above do too: 1e16 -> "1e+16"
 * - anything else is the shortest plain decimal: 0.25 -> "0.25"
 */
export function formatChecksumNumber(value: Decimal): string {
  const magnitude = value.abs();
  if (
    magnitude.greaterThanOrEqualTo(LARGE_EXPONENT_THRESHOLD) ||
    (!magnitude.isZero() && magnitude.lessThan(EXPONENT_THRESHOLD))
  ) {
    return value
      .toExponential()
      .replace(
        /e([+-])(\d+)$/,
        (_match, sign: string, digits: string) =>
          `e${sign}${digits.padStart(2, '0')}`,
      );
  }

  if (value.isInteger()) {
    return value.toFixed(1);
  }

  return value.toFixed();
}

/**
 * Build the string the checksum is computed over: best bid, best ask,
 * second bid, second ask, ... each as "price:size", all joined by ":".
 * Both sides must already be sorted best first.
 */
export function checksumPayload(
  bids: readonly PriceLevel[],
  asks: readonly PriceLevel[],
  depth: number = CHECKSUM_DEPTH,
): string {
  const parts: string[] = [];
  const rows = Math.min(depth, Math.max(bids.length, asks.length));

  for (let i = 0; i < rows; i++) {
    const bid = bids[i];
    const ask = asks[i];
    if (bid) {
      parts.push(
        `${formatChecksumNumber(bid.price)}:${formatChecksumNumber(bid.size)}`,
      );
    }
    if (ask) {
      parts.push(
        `${formatChecksumNumber(ask.price)}:${formatChecksumNumber(ask.size)}`,
      );
    }
  }

  return parts.join(':');
}

// CRC32 over the UTF-8 bytes, as an unsigned 32-bit integer
export function computeChecksum(
  bids: readonly PriceLevel[],
  asks: readonly PriceLevel[],
  depth: number = CHECKSUM_DEPTH,
): number {
  return crc32.unsigned(checksumPayload(bids, asks, depth));
}
