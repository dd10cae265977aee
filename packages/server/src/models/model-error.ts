import {
  ContractViolationError,
  RoadNetworkError,
  UnknownRoadError,
  UnknownRouteError,
} from "@roadnet/routing";

/**
 * The single error type the HTTP facade lets out. `causeName` keeps the
 * name of the underlying error for diagnostics.
 */
export class ModelError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly causeName: string,
  ) {
    super(message);
    this.name = "ModelError";
  }
}

/** Translate anything thrown by the model into a ModelError */
export function toModelError(err: unknown): ModelError {
  if (err instanceof ModelError) return err;
  if (err instanceof UnknownRoadError || err instanceof UnknownRouteError) {
    return new ModelError(err.message, 404, err.name);
  }
  if (err instanceof RoadNetworkError) {
    return new ModelError(err.message, 409, err.name);
  }
  if (err instanceof ContractViolationError) {
    return new ModelError(err.message, 500, err.name);
  }
  if (err instanceof Error) {
    return new ModelError(err.message, 500, err.name);
  }
  return new ModelError(String(err), 500, "UnknownError");
}
