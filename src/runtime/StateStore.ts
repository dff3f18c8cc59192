/**
 * Heterogeneous store - owns exactly one instance of each declared state, in order
 */

import { StateMismatchError, UncopyableStateError } from '../errors';
import type { InstancesOf, Position, StateClass, StateRef } from '../types';

interface Cloneable {
  clone(): unknown;
}

const isCloneable = (value: object): value is Cloneable => {
  return 'clone' in value && typeof value.clone === 'function';
};

/**
 * Positions are plain integers in [0, arity)
 */
export function isPositionIn<T extends readonly unknown[]>(p: number, arity: number): p is Position<T> {
  return Number.isInteger(p) && p >= 0 && p < arity;
}

const isCopyOf = <S extends object>(copy: unknown, original: S): copy is S => {
  return (
    typeof copy === 'object' &&
    copy !== null &&
    copy !== original &&
    Object.getPrototypeOf(copy) === Object.getPrototypeOf(original)
  );
};

export const nameOf = (value: unknown): string => {
  if (typeof value === 'object' && value !== null) {
    return value.constructor.name || 'Object';
  }
  return typeof value;
};

/**
 * A class can be copied when it defines `clone()` or can be rebuilt without arguments
 */
export function isCopyable(StateType: StateClass): boolean {
  const proto: unknown = StateType.prototype;
  const clones = typeof proto === 'object' && proto !== null && 'clone' in proto && typeof proto.clone === 'function';
  return clones || StateType.length === 0;
}

/**
 * Deep copy of a data member. Functions are shared; arrays, maps, sets,
 * dates and objects are copied with their prototypes. `seen` keeps cycles.
 */
const copyValue = (value: unknown, seen: WeakMap<object, unknown>): unknown => {
  if (typeof value !== 'object' || value === null) {
    return value;
  }
  if (seen.has(value)) {
    return seen.get(value);
  }

  if (value instanceof Date) {
    return new Date(value.getTime());
  }
  if (Array.isArray(value)) {
    const copy: unknown[] = [];
    seen.set(value, copy);
    for (const item of value) {
      copy.push(copyValue(item, seen));
    }
    return copy;
  }
  if (value instanceof Map) {
    const copy = new Map<unknown, unknown>();
    seen.set(value, copy);
    value.forEach((item: unknown, key: unknown) => {
      copy.set(copyValue(key, seen), copyValue(item, seen));
    });
    return copy;
  }
  if (value instanceof Set) {
    const copy = new Set<unknown>();
    seen.set(value, copy);
    value.forEach((item: unknown) => {
      copy.add(copyValue(item, seen));
    });
    return copy;
  }

  const copy: object = Object.create(Object.getPrototypeOf(value));
  seen.set(value, copy);
  for (const key of Reflect.ownKeys(value)) {
    const descriptor = Reflect.getOwnPropertyDescriptor(value, key);
    if (descriptor) {
      if ('value' in descriptor) {
        descriptor.value = copyValue(descriptor.value, seen);
      }
      Reflect.defineProperty(copy, key, descriptor);
    }
  }
  return copy;
};

/**
 * Copy one state. States with a `clone()` method copy themselves. Any other
 * state is rebuilt by its zero-argument constructor, which gives the copy its
 * own handler closures and `#private` fields, and then receives a deep copy of
 * every data member of the source.
 */
export function copyState<S extends object>(state: S, position: number): S {
  if (isCloneable(state)) {
    const copy = state.clone();
    if (!isCopyOf(copy, state)) {
      throw new StateMismatchError(position, nameOf(state), nameOf(copy));
    }
    return copy;
  }

  const StateType: unknown = state.constructor;
  if (typeof StateType !== 'function' || StateType.length > 0) {
    throw new UncopyableStateError(nameOf(state));
  }

  const copy: S = Reflect.construct(StateType, []);
  const seen = new WeakMap<object, unknown>([[state, copy]]);
  for (const key of Reflect.ownKeys(state)) {
    const value: unknown = Reflect.get(state, key);
    if (typeof value !== 'function') {
      Reflect.set(copy, key, copyValue(value, seen));
    }
  }
  return copy;
}

export class StateStore<States extends readonly object[]> {
  private constructor(private readonly items: States) {}

  /**
   * Take ownership of N values given in declared order
   */
  static of<States extends readonly object[]>(values: States): StateStore<States> {
    return new StateStore(values);
  }

  /**
   * Default-construct every declared class, in order
   */
  static defaults<Classes extends readonly StateClass[]>(classes: Classes): StateStore<InstancesOf<Classes>> {
    const states: readonly object[] = classes.map(StateType => new StateType());
    return new StateStore(states as InstancesOf<Classes>);
  }

  get size(): number {
    return this.items.length;
  }

  isPosition(p: number): p is Position<States> {
    return isPositionIn<States>(p, this.items.length);
  }

  at<P extends Position<States>>(p: P): States[P] {
    return this.items[p];
  }

  /**
   * Tagged reference to the state at `p`
   */
  ref<P extends Position<States>>(p: P): StateRef<States, P> {
    return { index: p, state: this.items[p] };
  }

  values(): ReadonlyArray<States[number]> {
    return [...this.items];
  }

  /**
   * Value-wise copy; no state instance is shared with the copy
   */
  clone(): StateStore<States> {
    const copies: readonly object[] = this.items.map((state, position) => copyState(state, position));
    return new StateStore(copies as States);
  }
}
