/**
 * Remote Constraint Source
 *
 * Adds codelist entries fetched from the catalogue to what the record
 * itself states.
 */

import { createLogger, type Logger } from "../logger"
import type { ConceptLookup } from "../lookup/client"
import type { ConceptRecord } from "../lookup/schemas"
import { RecordConstraintSource, codelistValues } from "./record-source"
import type { ConstraintFacts, ConstraintSource } from "./types"

export class RemoteConstraintSource implements ConstraintSource {
  readonly name = "remote"

  private readonly logger: Logger

  constructor(
    private readonly lookup: ConceptLookup,
    private readonly base: RecordConstraintSource = new RecordConstraintSource(),
    logger?: Logger,
  ) {
    this.logger = logger ?? createLogger({ component: "RemoteConstraintSource" })
  }

  async extract(record: ConceptRecord): Promise<ConstraintFacts> {
    const facts = this.base.read(record)
    if (facts.inValues) return facts

    try {
      const values = codelistValues(await this.lookup.getCodelistEntries(record.id))
      return values.length > 0 ? { ...facts, inValues: values } : facts
    } catch (error) {
      this.logger.warn({ err: error, conceptId: record.id }, "Codelist lookup failed")
      return facts
    }
  }
}
