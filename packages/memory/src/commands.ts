/**
 * Command Dispatch
 *
 * Runs validated boundary messages against a schema graph.
 */

import { parseCommand } from "shapegraph"
import type { Command, CommandType } from "shapegraph"
import type { SchemaGraph } from "./graph"
import type { StoreStats } from "./store"

/**
 * Outcome of a dispatched command.
 */
export interface CommandResult {
  type: CommandType
  /** Id of the node or edge the command created or touched, if any */
  id?: string
  /** Exclusive groups as stored, for `setXoneGroups` */
  groups?: string[][]
  stats: StoreStats
}

/**
 * Validate an untrusted message and apply it to the graph.
 *
 * @throws ValidationError if the message doesn't match any command schema
 * @throws NotFoundError / InvalidStateError from the graph operation
 */
export function dispatch(graph: SchemaGraph, message: unknown): CommandResult {
  return apply(graph, parseCommand(message))
}

/**
 * Apply an already validated command.
 */
export function apply(graph: SchemaGraph, command: Command): CommandResult {
  const done = (extra: { id?: string; groups?: string[][] } = {}): CommandResult => ({
    type: command.type,
    ...extra,
    stats: graph.stats(),
  })

  switch (command.type) {
    case "addNode":
      return done({ id: graph.addNode(command.kind, command.title, command.description) })

    case "updateNode":
      graph.updateNode(command.id, {
        title: command.title,
        description: command.description,
        datatype: command.datatype,
      })
      return done({ id: command.id })

    case "updateConstraints":
      graph.updateConstraints(command.id, command.constraints)
      return done({ id: command.id })

    case "connect":
      return done({ id: graph.connect(command.from, command.to, command.cardinality, command.order) })

    case "disconnect":
      graph.disconnect(command.from, command.to)
      return done()

    case "deleteNode":
      graph.deleteNode(command.id)
      return done({ id: command.id })

    case "updateEdge":
      graph.updateEdge(command.id, { cardinality: command.cardinality, order: command.order })
      return done({ id: command.id })

    case "deleteEdge":
      graph.deleteEdge(command.id)
      return done({ id: command.id })

    case "reset":
      graph.reset()
      return done({ id: graph.getDataset().id })

    case "setXoneGroups":
      return done({ groups: graph.setXoneGroups(command.groups) })

    case "unlinkConcept":
      graph.unlinkConcept(command.id)
      return done({ id: command.id })

    case "linkDataset":
      graph.linkDataset(command.record)
      return done({ id: graph.getDataset().id })

    case "unlinkDataset":
      graph.unlinkDataset()
      return done({ id: graph.getDataset().id })
  }
}
