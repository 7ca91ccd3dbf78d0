export { DART_WASM, dartParser, loadDartGrammar } from "./loader";
export { parseDart } from "./reader";
export type * from "./types";
