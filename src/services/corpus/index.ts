/**
 * Corpus Service - Public API
 */

export { parseExamples, parseExampleFile } from './example-parser.js';
export { parseFunctionSignatures, formatFunctionSignatures } from './function-signatures.js';
export { CorpusLoader, type CorpusLoaderOptions } from './corpus-loader.js';
