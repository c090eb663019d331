import type { Question } from "../../domain/models.js";
import { defaultRandom, sampleWithoutReplacement, type RandomSource } from "../../utils/random.js";

/**
 * Draws up to `count` distinct questions uniformly at random. A topic filter
 * narrows the draw only when at least one question matches it.
 */
export function selectQuizQuestions(
  pool: readonly Question[],
  count: number,
  topics?: Iterable<string>,
  random: RandomSource = defaultRandom
): Question[] {
  if (!Number.isFinite(count) || count <= 0 || pool.length === 0) {
    return [];
  }

  const filter = topics ? new Set(topics) : new Set<string>();
  const filtered = filter.size > 0 ? pool.filter((question) => filter.has(question.topic)) : [];
  const universe = filtered.length > 0 ? filtered : pool;

  return sampleWithoutReplacement(universe, Math.min(Math.floor(count), universe.length), random);
}
