export abstract class MarketStreamError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Payload could not be parsed, or would break a ladder invariant
 * (duplicate price, negative size). The frame is dropped.
 */
export class MalformedMessageError extends MarketStreamError {
  readonly code = 'MALFORMED_MESSAGE';

  constructor(
    message: string,
    readonly raw?: string,
  ) {
    super(message);
  }
}

/**
 * A diff reached a book that has no snapshot to build on.
 * The caller has to obtain a fresh snapshot.
 */
export class OutOfSequenceError extends MarketStreamError {
  readonly code = 'OUT_OF_SEQUENCE';

  constructor(readonly market: string) {
    super(`Update for ${market} received before a snapshot`);
  }
}
