/**
 * Tarn Printer
 * Source and s-expression renderings of the AST.
 */

export { formatLiteral, formatSource } from './format.js';
export { toSExpr } from './sexpr.js';
