/** Random source returning values in [0, 1). */
export type Rng = () => number;

/**
 * Process-global source. Seeded by the platform at startup; there is no
 * run-time seed control.
 */
export const defaultRng: Rng = () => Math.random();

export function randomIndex(rng: Rng, size: number): number {
  const idx = Math.floor(rng() * size);
  if (idx >= size) return size - 1;
  return idx < 0 ? 0 : idx;
}
