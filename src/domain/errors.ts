/**
 * Error taxonomy of the fan-out service.
 *
 * Capacity eviction is deliberately absent: an evicted subscriber sees a
 * normal end of stream, not an error.
 */

export class FanoutError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** An envelope that would corrupt the stream framing. Nothing is delivered. */
export class EnvelopeValidationError extends FanoutError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid envelope: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

/** No room for another subscription; existing subscribers keep being served. */
export class SubscriptionLimitError extends FanoutError {
  readonly limit: number;

  constructor(limit: number) {
    super(`Subscription limit of ${limit} reached`);
    this.limit = limit;
  }
}

export class EngineClosedError extends FanoutError {
  constructor() {
    super('Fan-out engine is closed');
  }
}

/** The control channel to a remote engine is unreachable or refused our credential. */
export class BoundaryConnectionError extends FanoutError {}

/** A text event-stream block that does not follow the `event:`/`data:` grammar. */
export class FramingError extends FanoutError {}
