/**
 * Importer Module
 */

export { importTurtle } from "./turtle-importer"
export type { ImportOptions } from "./turtle-importer"
