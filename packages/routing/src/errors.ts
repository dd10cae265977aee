/**
 * Error taxonomy for the road network.
 *
 * Two families:
 * - RoadNetworkError subclasses are recoverable: invalid input, duplicate
 *   identifications, queries on routes that do not chain. The network is
 *   left as it was before the failing call.
 * - ContractViolationError marks a programming error (calling a
 *   one-way road's opposite accessors, removing a segment that is not
 *   there). Callers are not expected to handle it.
 */

/** Base class for recoverable domain errors */
export class RoadNetworkError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RoadNetworkError";
  }
}

export class InvalidIdentificationError extends RoadNetworkError {
  constructor(public readonly identification: string) {
    super(`Invalid road identification: "${identification}"`);
    this.name = "InvalidIdentificationError";
  }
}

export class DuplicateIdentificationError extends RoadNetworkError {
  constructor(public readonly identification: string) {
    super(`Road identification already in use: "${identification}"`);
    this.name = "DuplicateIdentificationError";
  }
}

export class InvalidSpeedLimitError extends RoadNetworkError {
  constructor(public readonly speedLimit: number) {
    super(`Invalid speed limit: ${speedLimit}`);
    this.name = "InvalidSpeedLimitError";
  }
}

export class InvalidAverageSpeedError extends RoadNetworkError {
  constructor(
    public readonly averageSpeed: number,
    public readonly speedLimit: number,
  ) {
    super(`Invalid average speed ${averageSpeed} for speed limit ${speedLimit}`);
    this.name = "InvalidAverageSpeedError";
  }
}

/** An allowed identification length in the configuration is out of range */
export class InvalidLengthError extends RoadNetworkError {
  constructor(public readonly length: number) {
    super(`Invalid identification length: ${length}`);
    this.name = "InvalidLengthError";
  }
}

export class InvalidDelayError extends RoadNetworkError {
  constructor(public readonly delay: number) {
    super(`Invalid delay: ${delay}`);
    this.name = "InvalidDelayError";
  }
}

/** A derived query was called on a route whose segments do not chain */
export class InvalidStateError extends RoadNetworkError {
  constructor(public readonly routeId: string) {
    super(`Route ${routeId} does not form a continuous path`);
    this.name = "InvalidStateError";
  }
}

/** A segment edit was rejected; the route is unchanged */
export class InvalidSegmentError extends RoadNetworkError {
  constructor(
    public readonly routeId: string,
    reason: string,
  ) {
    super(`Route ${routeId}: ${reason}`);
    this.name = "InvalidSegmentError";
  }
}

export class UnknownRoadError extends RoadNetworkError {
  constructor(public readonly roadId: string) {
    super(`Unknown road: ${roadId}`);
    this.name = "UnknownRoadError";
  }
}

export class UnknownRouteError extends RoadNetworkError {
  constructor(public readonly routeId: string) {
    super(`Unknown route: ${routeId}`);
    this.name = "UnknownRouteError";
  }
}

/** A precondition of the API was broken by the caller */
export class ContractViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ContractViolationError";
  }
}

export function assertContract(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new ContractViolationError(message);
  }
}
