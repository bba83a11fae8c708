export { TurtleCompiler, createTurtleCompiler } from "./compiler"
export { N3TripleSink } from "./sink"
export type { TripleSink, TripleSubject, TripleObject } from "./sink"
export { documentPrefixes, renderPrefixBlock, finalizeTurtle } from "./prefixes"
