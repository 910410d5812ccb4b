/**
 * Typed error model for machine-actionable error handling.
 *
 * Every failure the client raises is a `WorkflowClientError` subclass that
 * carries a `TypedError` payload, so callers can branch on the class or on the
 * namespaced code and read remediation hints without parsing messages.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain = 'GRAPH' | 'TRANSPORT' | 'PROVISIONING' | 'SESSION' | 'CONFIG';

/** Typed suggested fix that a caller can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure attached to every thrown client error. */
export interface TypedError {
  /** Namespaced error code (e.g., "GRAPH.NOT_FOUND"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Associated node if applicable. */
  nodeId?: number;
  /** Associated job if applicable. */
  jobId?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  /** Machine-actionable remediation suggestions. */
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  nodeId?: number;
  jobId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    nodeId: params.nodeId,
    jobId: params.jobId,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Base class of every error thrown by the client. */
export class WorkflowClientError extends Error {
  public readonly typedError: TypedError;

  constructor(typedError: TypedError, options?: { cause?: unknown }) {
    super(typedError.message, options);
    this.name = 'WorkflowClientError';
    this.typedError = typedError;
  }

  get code(): string {
    return this.typedError.code;
  }

  get retryable(): boolean {
    return this.typedError.retryable;
  }
}

/** Unknown node or property reference. Local; the caller must fix the graph. */
export class NotFoundError extends WorkflowClientError {
  constructor(typedError: TypedError) {
    super(typedError);
    this.name = 'NotFoundError';
  }
}

/** A name resolved to more than one node. */
export class AmbiguousError extends WorkflowClientError {
  /** Ids of every node the lookup matched, in declaration order. */
  public readonly candidates: number[];

  constructor(typedError: TypedError, candidates: number[]) {
    super(typedError);
    this.name = 'AmbiguousError';
    this.candidates = candidates;
  }
}

/** A structural edit or a property write violated the graph invariants. */
export class InvalidGraphError extends WorkflowClientError {
  constructor(typedError: TypedError) {
    super(typedError);
    this.name = 'InvalidGraphError';
  }
}

/** Network or connection failure talking to an already-running server. */
export class TransportError extends WorkflowClientError {
  public readonly statusCode?: number;

  constructor(typedError: TypedError, options?: { cause?: unknown; statusCode?: number }) {
    super(typedError, { cause: options?.cause });
    this.name = 'TransportError';
    this.statusCode = options?.statusCode;
  }
}

/** The server refused a submitted graph (validation errors reported per node). */
export class SubmissionRejectedError extends TransportError {
  public readonly nodeErrors: Record<string, unknown>;

  constructor(typedError: TypedError, nodeErrors: Record<string, unknown>, statusCode?: number) {
    super(typedError, { statusCode });
    this.name = 'SubmissionRejectedError';
    this.nodeErrors = nodeErrors;
  }
}

/** Remote worker acquisition failed. Distinct from TransportError. */
export class ProvisioningError extends WorkflowClientError {
  constructor(typedError: TypedError, options?: { cause?: unknown }) {
    super(typedError, options);
    this.name = 'ProvisioningError';
  }
}

/** A caller-specified deadline passed while awaiting a terminal state. */
export class TimeoutError extends WorkflowClientError {
  constructor(typedError: TypedError) {
    super(typedError);
    this.name = 'TimeoutError';
  }
}

/** Client configuration failed validation. */
export class ConfigError extends WorkflowClientError {
  constructor(typedError: TypedError) {
    super(typedError);
    this.name = 'ConfigError';
  }
}

// --- Common error factory functions ---

export function nodeNotFoundError(reference: number | string, kind: 'id' | 'name' | 'type'): NotFoundError {
  return new NotFoundError(
    createTypedError({
      code: 'GRAPH.NOT_FOUND',
      message: `No node with ${kind} ${JSON.stringify(reference)}`,
      nodeId: typeof reference === 'number' ? reference : undefined,
      details: { reference, kind },
    }),
  );
}

export function propertyNotFoundError(nodeId: number, property: string, available: string[]): NotFoundError {
  return new NotFoundError(
    createTypedError({
      code: 'GRAPH.NOT_FOUND',
      message: `Node ${nodeId} has no property "${property}"`,
      nodeId,
      details: { property, available },
      suggestedFixes: available.length > 0
        ? [{ type: 'USE_EXISTING_PROPERTY', params: { available } }]
        : [],
    }),
  );
}

export function ambiguousNodeError(reference: string, kind: 'name' | 'type', candidates: number[]): AmbiguousError {
  return new AmbiguousError(
    createTypedError({
      code: 'GRAPH.AMBIGUOUS',
      message: `${candidates.length} nodes share the ${kind} "${reference}" (ids ${candidates.join(', ')})`,
      details: { reference, kind, candidates },
      suggestedFixes: [
        { type: 'LOOKUP_BY_ID', params: { candidates }, description: 'Resolve the node by its id instead' },
      ],
    }),
    candidates,
  );
}

export function invalidGraphError(message: string, details?: Record<string, unknown>, nodeId?: number): InvalidGraphError {
  return new InvalidGraphError(
    createTypedError({ code: 'GRAPH.INVALID', message, nodeId, details }),
  );
}

export function uiFormatError(): InvalidGraphError {
  return new InvalidGraphError(
    createTypedError({
      code: 'GRAPH.UI_FORMAT',
      message: 'Workflow is in the editor (UI) format; convert it to the API format before loading',
      suggestedFixes: [
        {
          type: 'CONVERT_WORKFLOW',
          params: {},
          description: 'Export the workflow in API format, or load it with a connection that can convert workflows',
        },
      ],
    }),
  );
}

export function propertyTypeError(nodeId: number, property: string, expected: string, received: string): InvalidGraphError {
  return new InvalidGraphError(
    createTypedError({
      code: 'GRAPH.PROPERTY_TYPE',
      message: `Property "${property}" on node ${nodeId} holds a ${expected}; cannot assign a ${received}`,
      nodeId,
      details: { property, expected, received },
    }),
  );
}

export function transportError(
  message: string,
  params: { code?: string; retryable?: boolean; statusCode?: number; jobId?: string; cause?: unknown } = {},
): TransportError {
  return new TransportError(
    createTypedError({
      code: params.code ?? 'TRANSPORT.CONNECTION',
      message,
      jobId: params.jobId,
      retryable: params.retryable ?? false,
      details: params.statusCode !== undefined ? { statusCode: params.statusCode } : undefined,
    }),
    { cause: params.cause, statusCode: params.statusCode },
  );
}

export function provisioningError(message: string, cause?: unknown, details?: Record<string, unknown>): ProvisioningError {
  return new ProvisioningError(
    createTypedError({
      code: 'PROVISIONING.ACQUIRE_FAILED',
      message,
      details,
      suggestedFixes: [
        { type: 'CHECK_PROVIDER', params: {}, description: 'Verify the remote provider credentials and capacity' },
      ],
    }),
    { cause },
  );
}

export function sessionTimeoutError(jobId: string, timeoutMs: number): TimeoutError {
  return new TimeoutError(
    createTypedError({
      code: 'SESSION.TIMEOUT',
      message: `Job ${jobId} did not finish within ${timeoutMs}ms`,
      jobId,
      retryable: true,
      details: { timeoutMs },
      suggestedFixes: [
        { type: 'INCREASE_TIMEOUT', params: { timeoutMs: timeoutMs * 2 } },
      ],
    }),
  );
}

export function invalidConfigError(errors: string[]): ConfigError {
  return new ConfigError(
    createTypedError({
      code: 'CONFIG.INVALID',
      message: `Invalid client configuration: ${errors.join('; ')}`,
      details: { errors },
    }),
  );
}

/** Render an unknown thrown value as a message string. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Mask a secret value, preserving only the last 4 characters for
 * identification. Secrets shorter than 8 characters are fully masked.
 */
export function maskSecret(secret: string): string {
  if (!secret || secret.length < 8) return '****';
  return '*'.repeat(secret.length - 4) + secret.slice(-4);
}

/** Replace every occurrence of each secret in a message with its masked form. */
export function maskSecretsInMessage(message: string, secrets: string[]): string {
  let result = message;
  for (const secret of secrets) {
    if (secret && secret.length > 0) {
      result = result.split(secret).join(maskSecret(secret));
    }
  }
  return result;
}
