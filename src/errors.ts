/**
 * Error types raised by the providers and workflows.
 *
 * @module errors
 */

export type WorkflowErrorType =
  | 'provider_unavailable' // No provider configured, or the chosen one has no key
  | 'provider_failure'     // Every configured provider failed the request
  | 'invalid_response'     // Model output could not be parsed or validated
  | 'unknown_route'        // Router picked a route that isn't in the table
  | 'invalid_input';       // Caller passed something the workflow can't run

export class WorkflowError extends Error {
  readonly type: WorkflowErrorType;

  constructor(message: string, type: WorkflowErrorType, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'WorkflowError';
    this.type = type;
  }
}

export function isWorkflowError(error: unknown, type?: WorkflowErrorType): error is WorkflowError {
  return error instanceof WorkflowError && (type === undefined || error.type === type);
}

/**
 * Message of an unknown thrown value, for logging.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
