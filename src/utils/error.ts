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

export enum ECS_ERROR {
  ENTITY_OWNED_BY_OTHER_ENGINE = "ENTITY_OWNED_BY_OTHER_ENGINE",
  REGISTRY_MISMATCH = "REGISTRY_MISMATCH",
  FAMILY_NOT_REGISTERED = "FAMILY_NOT_REGISTERED",
  INVALID_DELTA_TIME = "INVALID_DELTA_TIME",
}

export class ECSError extends AppError {
  constructor(
    public readonly category: ECS_ERROR,
    message?: string,
    context?: Record<string, unknown>,
  ) {
    super(message ?? category, true, context);
  }
}

export function is_ecs_error(error: unknown): error is ECSError {
  return error instanceof ECSError;
}
