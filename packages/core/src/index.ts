/**
 * @cloverrun/core
 *
 * Domain types, schemas and deterministic primitives shared by every other
 * package. Depends on nothing but zod.
 */

export * from './domain/index.js';
export * from './ports/index.js';
export {
  SeededRNG,
  createDeterministicRNG,
  type DeterministicRNG,
} from './determinism.js';
