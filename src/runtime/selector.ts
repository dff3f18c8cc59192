/**
 * Runtime selector - turns a position back into a tagged reference
 *
 * The table holds one accessor per declared position and is built once per
 * machine definition. Selecting a state is a single index plus one call.
 */

import { InvalidPositionError } from '../errors';
import type { Position, StateRef } from '../types';
import { StateStore, isPositionIn } from './StateStore';

export type Accessor<States extends readonly object[]> = (store: StateStore<States>) => StateRef<States>;

export interface TupleRef<T extends readonly unknown[], P extends Position<T> = Position<T>> {
  readonly index: P;
  readonly value: T[P];
}

export class RuntimeSelector<States extends readonly object[]> {
  private readonly table: ReadonlyArray<Accessor<States>>;

  constructor(readonly arity: number) {
    const table: Accessor<States>[] = [];
    for (let p = 0; p < arity; p += 1) {
      if (isPositionIn<States>(p, arity)) {
        const index = p;
        table.push(store => store.ref(index));
      }
    }
    this.table = table;
  }

  /**
   * Tagged reference to the state at `p` inside `store`
   */
  select(store: StateStore<States>, p: number): StateRef<States> {
    const accessor = this.table[p];
    if (accessor === undefined || store.size !== this.arity) {
      throw new InvalidPositionError(p, this.arity);
    }
    return accessor(store);
  }
}

export function createRuntimeSelector<States extends readonly object[]>(arity: number): RuntimeSelector<States> {
  return new RuntimeSelector<States>(arity);
}

/**
 * Position-based access into any fixed tuple, pairs included
 */
export function runtimeGet<T extends readonly unknown[]>(tuple: T, p: number): TupleRef<T> {
  if (!isPositionIn<T>(p, tuple.length)) {
    throw new InvalidPositionError(p, tuple.length);
  }
  return { index: p, value: tuple[p] };
}

/**
 * Narrow a tagged reference to the state declared at position `p`
 */
export function isStateRef<States extends readonly object[], P extends Position<States>>(
  ref: StateRef<States>,
  p: P
): ref is StateRef<States, P> {
  return ref.index === p;
}
