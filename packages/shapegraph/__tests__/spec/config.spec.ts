/**
 * Configuration and Error Specification Tests
 */

import { describe, it, expect } from "vitest"
import { defaultConfig, loadConfig } from "../../src/config"
import {
  CollaboratorError,
  InvalidStateError,
  MalformedInputError,
  NotFoundError,
  ShapeGraphError,
  ValidationError,
  toErrorPayload,
} from "../../src/errors"

describe("Configuration", () => {
  it("has defaults for every setting", () => {
    const config = defaultConfig()

    expect(config.baseUri).toBe("https://www.i14y.admin.ch")
    expect(config.conceptBaseUri).toBe("https://www.i14y.admin.ch/catalog/concepts")
    expect(config.lookupTimeoutMs).toBe(10_000)
    expect(config.datasetIdCase).toBe("lower")
    expect(config.schemaVersion).toBe("1.0.0")
    expect(config.sessionTtlMs).toBe(1_800_000)
    expect(config.maxSessions).toBe(1000)
  })

  it("reads SHAPEGRAPH_* variables and coerces numbers", () => {
    const config = loadConfig({
      SHAPEGRAPH_BASE_URI: "https://example.org",
      SHAPEGRAPH_LOOKUP_TIMEOUT_MS: " 2500 ",
      SHAPEGRAPH_DATASET_ID_CASE: "upper",
      SHAPEGRAPH_LOG_LEVEL: "",
    })

    expect(config.baseUri).toBe("https://example.org")
    expect(config.lookupTimeoutMs).toBe(2500)
    expect(config.datasetIdCase).toBe("upper")
    expect(config.logLevel).toBe("info")
  })

  it("lets overrides win over the environment", () => {
    const config = loadConfig({ SHAPEGRAPH_SCHEMA_VERSION: "2.0.0" }, { schemaVersion: "3.1.0" })
    expect(config.schemaVersion).toBe("3.1.0")
  })

  it("rejects invalid values", () => {
    expect(() => loadConfig({ SHAPEGRAPH_MAX_SESSIONS: "many" })).toThrow(ValidationError)
    expect(() => loadConfig({ SHAPEGRAPH_DATASET_ID_CASE: "title" })).toThrow(/datasetIdCase/)
  })
})

describe("Errors", () => {
  it("carries a machine-readable code", () => {
    expect(new NotFoundError("node", "n1").code).toBe("NOT_FOUND")
    expect(new InvalidStateError("no dataset", "NoDataset").code).toBe("INVALID_STATE")
    expect(new MalformedInputError("minCount", "abc").code).toBe("MALFORMED_INPUT")
    expect(new CollaboratorError("down", "i14y").code).toBe("COLLABORATOR_FAILURE")
    expect(new ValidationError("bad").code).toBe("VALIDATION")
  })

  it("names the missing entity", () => {
    const error = new NotFoundError("edge", "a-b")

    expect(error).toBeInstanceOf(ShapeGraphError)
    expect(error.message).toBe("Edge not found: 'a-b'")
    expect(new NotFoundError("session", "s1").message).toBe("Session not found: 's1'")
  })

  it("keeps the cause of a collaborator failure", () => {
    const cause = new Error("socket hang up")
    expect(new CollaboratorError("lookup failed", "i14y", cause).cause).toBe(cause)
  })

  it("collapses thrown values into payloads", () => {
    expect(toErrorPayload(new InvalidStateError("sole dataset", "SoleDataset"))).toEqual({
      code: "INVALID_STATE",
      message: "sole dataset",
    })
    expect(toErrorPayload(new Error("boom"))).toEqual({ code: "INTERNAL", message: "boom" })
    expect(toErrorPayload("odd")).toEqual({ code: "INTERNAL", message: "odd" })
  })
})
