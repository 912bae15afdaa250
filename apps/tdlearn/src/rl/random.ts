import seedrandom from 'seedrandom';
import { RandomSource } from './types';

let shared: RandomSource = Math.random;

/**
 * Draw from the process-wide source used by strategies without their own.
 */
export const random: RandomSource = () => shared();

/**
 * Replace the process-wide source with a seeded generator.
 * Seed before constructing learners for reproducible runs.
 */
export function seedRandom(seed: string): void {
  shared = seedrandom(seed);
}

export function resetRandom(): void {
  shared = Math.random;
}

/**
 * Independent seeded generator, unaffected by the shared source.
 */
export function createRandom(seed: string): RandomSource {
  return seedrandom(seed);
}
