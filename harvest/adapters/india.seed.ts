import type { UniversityTarget } from "../adapter.types.js";

// Processed in this order. slug / wikiTitle only where the derived ones are wrong.
export const INDIA_TARGETS: UniversityTarget[] = [
  { name: "University of Hyderabad" },
  { name: "Osmania University" },
  { name: "University of Madras" },
  { name: "National Institute of Technology Warangal", wikiTitle: "National_Institute_of_Technology,_Warangal" },
  { name: "National Institute of Technology Calicut" },
  { name: "Indian Institute of Technology Mandi" },
];

/** Names from the environment replace the seed list; known seeds keep their overrides. */
export function resolveTargets(names: string[], seed: UniversityTarget[] = INDIA_TARGETS): UniversityTarget[] {
  if (!names.length) return seed;
  const byName = new Map(seed.map(t => [t.name.toLowerCase(), t]));
  return names.map(name => byName.get(name.toLowerCase()) ?? { name });
}
