import { Action, Actor, Rng, StoredTopic } from '../types';
import { pickOne } from './random';

export const DEFAULT_ORIGINATE_PROBABILITY = 0.15;

/**
 * Chooses what an actor does given the topics it can see
 */
export type ActionPolicy = (actor: Actor, recent: readonly StoredTopic[], rng: Rng) => Action;

export interface ActionPolicyOptions {
  originateProbability?: number;
}

/**
 * Base policy: with nothing to read, start a topic. Otherwise start one with
 * `originateProbability`, else reply to a uniformly chosen recent topic.
 *
 * The actor is not consulted yet; every persona follows the same odds.
 */
export function createActionPolicy(options: ActionPolicyOptions = {}): ActionPolicy {
  const originateProbability = options.originateProbability ?? DEFAULT_ORIGINATE_PROBABILITY;

  return (_actor, recent, rng) => {
    if (recent.length === 0) {
      return { kind: 'originate' };
    }
    if (rng() < originateProbability) {
      return { kind: 'originate' };
    }
    return { kind: 'respond', target: pickOne(recent, rng) };
  };
}

export const decide: ActionPolicy = createActionPolicy();
