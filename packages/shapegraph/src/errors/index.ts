/**
 * Errors Module
 */

export {
  ShapeGraphError,
  NotFoundError,
  InvalidStateError,
  MalformedInputError,
  CollaboratorError,
  ValidationError,
  toErrorPayload,
} from "./errors"
export type { ShapeGraphErrorCode, InvalidStateReason, ErrorPayload } from "./errors"
