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

export enum SCHEDULER_ERROR {
  EID_MAX_INDEX_OVERFLOW = "EID_MAX_INDEX_OVERFLOW",
  EID_MAX_GEN_OVERFLOW = "EID_MAX_GEN_OVERFLOW",
  COMPONENT_NOT_REGISTERED = "COMPONENT_NOT_REGISTERED",
  ENTITY_NOT_ALIVE = "ENTITY_NOT_ALIVE",
  ARCHETYPE_NOT_FOUND = "ARCHETYPE_NOT_FOUND",
  RESOURCE_NOT_FOUND = "RESOURCE_NOT_FOUND",
  DUPLICATE_RESOURCE = "DUPLICATE_RESOURCE",
  EVENT_NOT_REGISTERED = "EVENT_NOT_REGISTERED",
  STATE_NOT_INITIALIZED = "STATE_NOT_INITIALIZED",
  RESERVED_STAGE = "RESERVED_STAGE",
  APP_ALREADY_BUILT = "APP_ALREADY_BUILT",
  INVALID_OPTIONS = "INVALID_OPTIONS",
  INVALID_RESOURCE = "INVALID_RESOURCE",
}

/**
 * Misconfiguration of the app (a resource nobody inserted, an event nobody
 * registered, a stale entity). Never operational: these propagate out of
 * build() / tick() and are not meant to be caught by the host.
 */
export class SchedulerError extends AppError {
  constructor(
    public readonly category: SCHEDULER_ERROR,
    message?: string,
    context?: Record<string, unknown>,
  ) {
    super(message ?? category, false, context);
  }
}

export function is_scheduler_error(error: unknown): error is SchedulerError {
  return error instanceof SchedulerError;
}
