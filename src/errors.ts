export class OrderingViolationError extends Error {
  constructor(
    message: string,
    public readonly context: {
      entityKey?: string;
      eventId: string;
      eventStartsAt: string;
      lastAppliedAt: string;
      lastEventId?: string;
    }
  ) {
    super(message);
    this.name = 'OrderingViolationError';
  }
}

export class TemporalLeakError extends Error {
  constructor(
    message: string,
    public readonly context: {
      fold?: number;
      eventId?: string;
      entityKey?: string;
      eventStartsAt?: string;
      observedAt?: string;
    } = {}
  ) {
    super(message);
    this.name = 'TemporalLeakError';
  }
}

export class InvalidEventError extends Error {
  constructor(
    message: string,
    public readonly context: {
      eventId?: string;
      issues?: string[];
    } = {}
  ) {
    super(message);
    this.name = 'InvalidEventError';
  }
}

export class OutcomeAlreadySettledError extends Error {
  constructor(public readonly eventId: string) {
    super(`event ${eventId} is already settled`);
    this.name = 'OutcomeAlreadySettledError';
  }
}

export class EventLookupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EventLookupError';
  }
}

export class ModelNotFittedError extends Error {
  constructor(message = 'model has not been fitted') {
    super(message);
    this.name = 'ModelNotFittedError';
  }
}

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** Ordering and leakage failures abort a run; everything else is recoverable or local. */
export const isFatalTemporalError = (err: unknown): err is OrderingViolationError | TemporalLeakError =>
  err instanceof OrderingViolationError || err instanceof TemporalLeakError;
