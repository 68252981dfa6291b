export type ErrorKind = 'NotFound' | 'Conflict' | 'Unavailable' | 'InvalidInput' | 'PartialFailure'

/**
 * Base class for every failure tmux-box reports to the user.
 * `resource` names the session, file or directory involved.
 */
export class TBoxError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string,
    public readonly resource: string
  ) {
    super(message)
    this.name = 'TBoxError'
  }
}

/** Archive or session absent */
export class NotFoundError extends TBoxError {
  constructor(message: string, resource: string) {
    super('NotFound', message, resource)
    this.name = 'NotFoundError'
  }
}

/** Restore target holds windows and neither force nor append was given */
export class ConflictError extends TBoxError {
  constructor(message: string, resource: string) {
    super('Conflict', message, resource)
    this.name = 'ConflictError'
  }
}

/** tmux server cannot be reached */
export class UnavailableError extends TBoxError {
  constructor(message: string, resource: string) {
    super('Unavailable', message, resource)
    this.name = 'UnavailableError'
  }
}

/** Malformed dump, bad option combination or a missing session name */
export class InvalidInputError extends TBoxError {
  constructor(message: string, resource: string) {
    super('InvalidInput', message, resource)
    this.name = 'InvalidInputError'
  }
}

/**
 * Part of a multi-step operation failed. Restore uses it with the window and
 * pane that could not be created; work done before the failure is kept.
 */
export class PartialFailureError extends TBoxError {
  constructor(
    message: string,
    resource: string,
    public readonly windowIndex?: number,
    public readonly paneIndex?: number,
    public readonly reason?: unknown
  ) {
    super('PartialFailure', message, resource)
    this.name = 'PartialFailureError'
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
