/**
 * Error classes shared by the ledger, the policy gate, the agent loop and the
 * HTTP layer. The HTTP error middleware maps each class to a status code.
 */

// A single failed constraint, addressed by JSON pointer
export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Malformed input: bad depth, unknown tool, unsafe query, schema mismatch.
 * Raised before any store is contacted.
 */
export class ValidationError extends Error {
  public readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super(message);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export class NotFoundError extends Error {
  constructor(
    public readonly resource: string,
    public readonly id: string,
  ) {
    super(`${resource} not found: ${id}`);
    this.name = 'NotFoundError';
  }
}

export type Upstream = 'neo4j' | 'postgres' | 'llm';

/**
 * A store or the language model could not be reached or timed out
 */
export class UpstreamUnavailableError extends Error {
  constructor(
    public readonly upstream: Upstream,
    message: string,
    cause?: unknown,
  ) {
    super(`${upstream} unavailable: ${message}`, { cause });
    this.name = 'UpstreamUnavailableError';
  }
}

/**
 * HTTP status for an error raised anywhere below the routes
 */
export function statusFor(error: unknown): number {
  if (error instanceof ValidationError) return 400;
  if (error instanceof NotFoundError) return 404;
  if (error instanceof UpstreamUnavailableError) return 502;
  return 500;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
