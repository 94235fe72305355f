export abstract class AppError extends Error {
  constructor(
    message: string,
    public readonly is_operational: boolean,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export enum CONTAINER_ERROR {
  OUT_OF_RANGE = "OUT_OF_RANGE",
  INCOMPARABLE_ELEMENTS = "INCOMPARABLE_ELEMENTS",
}

export class ContainerError extends AppError {
  constructor(
    public readonly category: CONTAINER_ERROR,
    message?: string,
    context?: Record<string, unknown>,
  ) {
    super(message ?? category, true, context);
  }
}

export function is_container_error(error: unknown): error is ContainerError {
  return error instanceof ContainerError;
}
