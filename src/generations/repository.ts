import { GenerationStateError, InvalidRequestError, NotFoundError } from '../engine/errors';
import type { Generation } from '../engine/types';

/** Anything that can read the generation history of a profile */
export interface GenerationSource {
  fetchGenerations(profile: string): Promise<Generation[]>;
}

export interface RollbackPlan {
  from: Generation;
  to: Generation;
}

/**
 * Sorts by id and checks the history is well-formed: unique ids and exactly
 * one current generation.
 */
export function normalizeGenerations(generations: readonly Generation[]): Generation[] {
  if (generations.length === 0) {
    throw new GenerationStateError('No system generations found');
  }

  const sorted = [...generations].sort((a, b) => a.id - b.id);

  for (let i = 1; i < sorted.length; i++) {
    if (sorted[i].id === sorted[i - 1].id) {
      throw new GenerationStateError(`Generation ${sorted[i].id} is listed twice`);
    }
  }

  const current = sorted.filter((g) => g.current);
  if (current.length !== 1) {
    throw new GenerationStateError(`Expected exactly one current generation, found ${current.length}`);
  }

  return sorted;
}

export function currentOf(generations: readonly Generation[]): Generation {
  const current = generations.find((g) => g.current);
  if (!current) {
    throw new GenerationStateError('Cannot determine the current generation');
  }
  return current;
}

/** Newest generation older than `id`, if any */
export function previousOf(generations: readonly Generation[], id: number): Generation | undefined {
  return generations.filter((g) => g.id < id).reduce<Generation | undefined>((best, g) => (!best || g.id > best.id ? g : best), undefined);
}

/**
 * Picks where a rollback lands: the requested generation when one is given,
 * otherwise the one just before the current generation.
 */
export function planRollback(generations: readonly Generation[], requested: number | null): RollbackPlan {
  const from = currentOf(generations);

  if (requested !== null) {
    const to = generations.find((g) => g.id === requested);
    if (!to) {
      throw new NotFoundError(`Generation ${requested}`);
    }
    return { from, to };
  }

  const to = previousOf(generations, from.id);
  if (!to) {
    throw new InvalidRequestError(`Generation ${from.id} is the oldest one; there is nothing to roll back to`);
  }
  return { from, to };
}

/**
 * Typed, ordered view over one profile's generation history.
 * Every read goes back to the source; nothing is cached between operations.
 */
export class GenerationRepository {
  constructor(
    private source: GenerationSource,
    private profile: string,
  ) {}

  async list(): Promise<Generation[]> {
    return normalizeGenerations(await this.source.fetchGenerations(this.profile));
  }

  async current(): Promise<Generation> {
    return currentOf(await this.list());
  }

  async find(id: number): Promise<Generation | undefined> {
    return (await this.list()).find((g) => g.id === id);
  }

  async planRollback(requested: number | null): Promise<RollbackPlan> {
    return planRollback(await this.list(), requested);
  }
}
