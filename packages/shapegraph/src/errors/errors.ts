/**
 * Custom Error Classes
 */

/**
 * Machine-readable error codes.
 */
export type ShapeGraphErrorCode =
  | "NOT_FOUND" // Operation referenced a missing node or edge
  | "INVALID_STATE" // Operation would break the single-dataset invariant
  | "MALFORMED_INPUT" // Unparsable constraint text
  | "COLLABORATOR_FAILURE" // Remote lookup or constraint source failed
  | "VALIDATION" // Boundary message did not match its schema

/**
 * Base error for all schema graph errors.
 */
export class ShapeGraphError extends Error {
  public override readonly cause?: Error

  constructor(
    message: string,
    public readonly code: ShapeGraphErrorCode,
    cause?: Error,
  ) {
    super(message)
    this.name = "ShapeGraphError"
    this.cause = cause

    // V8-specific stack trace capture (not in TypeScript's lib)
    if (typeof (Error as { captureStackTrace?: unknown }).captureStackTrace === "function") {
      ;(Error as { captureStackTrace: (target: Error, ctor: unknown) => void }).captureStackTrace(
        this,
        this.constructor,
      )
    }
  }
}

/**
 * Not found error.
 * Thrown when an operation references a node, edge or session that doesn't exist.
 */
export class NotFoundError extends ShapeGraphError {
  constructor(
    public readonly entity: "node" | "edge" | "session",
    public readonly id: string,
  ) {
    super(`${entity.charAt(0).toUpperCase()}${entity.slice(1)} not found: '${id}'`, "NOT_FOUND")
    this.name = "NotFoundError"
  }
}

export type InvalidStateReason =
  | "NoDataset"
  | "DuplicateDataset"
  | "SoleDataset"
  | "DuplicateId"
  | "KindMismatch"
  | "SessionLimit"
  | "NotLinked"

/**
 * Invalid state error.
 * Thrown when deleting the sole dataset, adding a second one,
 * or compiling a graph without a dataset.
 */
export class InvalidStateError extends ShapeGraphError {
  constructor(
    message: string,
    public readonly reason: InvalidStateReason,
  ) {
    super(message, "INVALID_STATE")
    this.name = "InvalidStateError"
  }
}

/**
 * Malformed input error.
 * Raised for unparsable constraint text; callers recover by treating the field as unset.
 */
export class MalformedInputError extends ShapeGraphError {
  constructor(
    public readonly field: string,
    public readonly received: unknown,
  ) {
    super(`Malformed value for ${field}: ${JSON.stringify(received)}`, "MALFORMED_INPUT")
    this.name = "MalformedInputError"
  }
}

/**
 * Collaborator failure.
 * Wraps a failure of the remote lookup or a constraint source.
 */
export class CollaboratorError extends ShapeGraphError {
  constructor(
    message: string,
    public readonly collaborator: string,
    cause?: Error,
  ) {
    super(message, "COLLABORATOR_FAILURE", cause)
    this.name = "CollaboratorError"
  }
}

/**
 * Validation error.
 * Thrown when a boundary message or snapshot doesn't match its schema.
 */
export class ValidationError extends ShapeGraphError {
  constructor(
    message: string,
    public readonly field?: string,
    public readonly received?: unknown,
  ) {
    super(message, "VALIDATION")
    this.name = "ValidationError"
  }
}

/**
 * Error payload returned by an outer boundary.
 */
export interface ErrorPayload {
  code: ShapeGraphErrorCode | "INTERNAL"
  message: string
}

/**
 * Collapse any thrown value into a boundary payload.
 */
export function toErrorPayload(error: unknown): ErrorPayload {
  if (error instanceof ShapeGraphError) {
    return { code: error.code, message: error.message }
  }
  if (error instanceof Error) {
    return { code: "INTERNAL", message: error.message }
  }
  return { code: "INTERNAL", message: String(error) }
}
