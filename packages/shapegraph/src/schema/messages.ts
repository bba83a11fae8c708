/**
 * Boundary Messages
 *
 * zod schemas for the commands an outer layer sends to a graph. Every
 * message is validated here before it reaches a mutation.
 */

import { z } from "zod"
import { ValidationError } from "../errors"
import { NODE_KINDS } from "./types"
import { localizedTextSchema } from "./snapshot"

// =============================================================================
// FIELD SCHEMAS
// =============================================================================

/**
 * Numeric form field: a number, numeric text, or empty.
 * Parsing is left to the graph, which treats malformed text as unset.
 */
const numericField = z.union([z.number(), z.string()]).nullable().optional()

/**
 * Enumeration values: a list, or comma-separated text.
 */
const inValuesField = z
  .union([z.array(z.string()), z.string()])
  .transform((value) =>
    (Array.isArray(value) ? value : value.split(","))
      .map((entry) => entry.trim())
      .filter((entry) => entry !== ""),
  )

export const constraintInputSchema = z.object({
  minCount: numericField,
  maxCount: numericField,
  minLength: numericField,
  maxLength: numericField,
  pattern: z.string().nullable().optional(),
  inValues: inValuesField.optional(),
  nodeReference: z.string().nullable().optional(),
  range: z.string().nullable().optional(),
  order: numericField,
})

export type ConstraintInput = z.infer<typeof constraintInputSchema>

export const nodeUpdateSchema = z.object({
  title: localizedTextSchema.optional(),
  description: localizedTextSchema.optional(),
  datatype: z.string().min(1).optional(),
})

export type NodeUpdate = z.infer<typeof nodeUpdateSchema>

export const edgeUpdateSchema = z.object({
  cardinality: z.string().optional(),
  order: z.number().int().nullable().optional(),
})

export type EdgeUpdate = z.infer<typeof edgeUpdateSchema>

// =============================================================================
// COMMANDS
// =============================================================================

const id = z.string().min(1)

export const addNodeMessage = z.object({
  type: z.literal("addNode"),
  kind: z.enum(NODE_KINDS),
  title: localizedTextSchema,
  description: localizedTextSchema.optional(),
})

export const updateNodeMessage = nodeUpdateSchema.extend({
  type: z.literal("updateNode"),
  id,
})

export const updateConstraintsMessage = z.object({
  type: z.literal("updateConstraints"),
  id,
  constraints: constraintInputSchema,
})

export const connectMessage = z.object({
  type: z.literal("connect"),
  from: id,
  to: id,
  cardinality: z.string().optional(),
  order: z.number().int().optional(),
})

export const disconnectMessage = z.object({
  type: z.literal("disconnect"),
  from: id,
  to: id,
})

export const deleteNodeMessage = z.object({
  type: z.literal("deleteNode"),
  id,
})

export const updateEdgeMessage = edgeUpdateSchema.extend({
  type: z.literal("updateEdge"),
  id,
})

export const deleteEdgeMessage = z.object({
  type: z.literal("deleteEdge"),
  id,
})

export const resetMessage = z.object({
  type: z.literal("reset"),
})

export const setXoneGroupsMessage = z.object({
  type: z.literal("setXoneGroups"),
  groups: z.array(z.array(id)),
})

export const unlinkConceptMessage = z.object({
  type: z.literal("unlinkConcept"),
  id,
})

export const catalogueRecordSchema = z.object({
  id,
  uri: z.string().url(),
  title: localizedTextSchema,
  description: localizedTextSchema.default(""),
  raw: z.record(z.string(), z.unknown()).default({}),
})

export const linkDatasetMessage = z.object({
  type: z.literal("linkDataset"),
  record: catalogueRecordSchema,
})

export const unlinkDatasetMessage = z.object({
  type: z.literal("unlinkDataset"),
})

export const commandSchema = z.discriminatedUnion("type", [
  addNodeMessage,
  updateNodeMessage,
  updateConstraintsMessage,
  connectMessage,
  disconnectMessage,
  deleteNodeMessage,
  updateEdgeMessage,
  deleteEdgeMessage,
  resetMessage,
  setXoneGroupsMessage,
  unlinkConceptMessage,
  linkDatasetMessage,
  unlinkDatasetMessage,
])

export type Command = z.infer<typeof commandSchema>
export type CommandType = Command["type"]

/**
 * Validate an untrusted command.
 * @throws ValidationError naming the first offending field
 */
export function parseCommand(input: unknown): Command {
  const result = commandSchema.safeParse(input)
  if (!result.success) {
    const issue = result.error.errors[0]
    const field = issue?.path.join(".")
    throw new ValidationError(
      `Invalid command${field ? ` (${field})` : ""}: ${issue?.message ?? "validation failed"}`,
      field,
      input,
    )
  }
  return result.data
}
