import { createRequire } from "node:module";
import Parser from "web-tree-sitter";

const require = createRequire(import.meta.url);

/** Compiled Dart grammar shipped by tree-sitter-wasms. */
export const DART_WASM = "tree-sitter-wasms/out/tree-sitter-dart.wasm";

let pending: Promise<Parser> | null = null;
let parser: Parser | null = null;

/**
 * Load the Dart grammar. The first call initializes the WebAssembly runtime;
 * later calls share the same parser. A failed load is retried on the next call.
 */
export function loadDartGrammar(): Promise<Parser> {
    pending ??= (async () => {
        await Parser.init();
        const language = await Parser.Language.load(require.resolve(DART_WASM));
        const instance = new Parser();
        instance.setLanguage(language);
        parser = instance;
        return instance;
    })().catch((error: unknown) => {
        pending = null;
        throw error;
    });
    return pending;
}

/** The loaded parser. Throws when `loadDartGrammar()` has not completed. */
export function dartParser(): Parser {
    if (parser === null) throw new Error("[dartsmith] Dart grammar is not loaded; await loadDartGrammar() first");
    return parser;
}
