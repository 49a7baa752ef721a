/**
 * Condition Set
 *
 * Mapping from node to the condition gating it. Mutate between runs only;
 * a running cursor reads it on every consideration.
 */

import { Always } from './conditions.js';
import type { Condition, ConditionContext, IConditionSet } from './types.js';

export class ConditionSet<N> implements IConditionSet<N> {
  private conditions: Map<N, Condition<N>> = new Map();

  constructor(conditions?: Iterable<[N, Condition<N>]>) {
    if (conditions) {
      this.addConditionSet(conditions);
    }
  }

  get size(): number {
    return this.conditions.size;
  }

  addCondition(owner: N, condition: Condition<N>): void {
    this.conditions.set(owner, condition);
  }

  addConditionSet(conditions: Iterable<[N, Condition<N>]>): void {
    for (const [owner, condition] of conditions) {
      this.addCondition(owner, condition);
    }
  }

  has(owner: N): boolean {
    return this.conditions.has(owner);
  }

  get(owner: N): Condition<N> | undefined {
    return this.conditions.get(owner);
  }

  owners(): N[] {
    return Array.from(this.conditions.keys());
  }

  isSatisfied(owner: N, ctx: Omit<ConditionContext<N>, 'owner'>): boolean {
    const condition = this.conditions.get(owner);
    if (!condition) {
      return true;
    }
    return condition.isSatisfied({ ...ctx, owner });
  }

  /**
   * Bind Always to every node in `nodes` that has no condition yet.
   * @returns the nodes that were defaulted
   */
  bindDefaults(nodes: Iterable<N>): N[] {
    const defaulted: N[] = [];
    for (const node of nodes) {
      if (!this.conditions.has(node)) {
        this.conditions.set(node, new Always());
        defaulted.push(node);
      }
    }
    return defaulted;
  }

  [Symbol.iterator](): Iterator<[N, Condition<N>]> {
    return this.conditions.entries();
  }
}
