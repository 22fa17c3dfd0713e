/**
 * Tarn Resolver
 * Static scope resolution between parsing and execution
 */

export { resolve } from './resolver.js';
export type {
  ClassType,
  FunctionType,
  ResolutionTable,
  ResolveResult,
} from './types.js';
