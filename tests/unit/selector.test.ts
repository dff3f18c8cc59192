/**
 * Unit tests for position-based selection
 */

import { InvalidPositionError } from '../../src/errors';
import { createRuntimeSelector, isStateRef, runtimeGet } from '../../src/runtime/selector';
import { StateStore } from '../../src/runtime/StateStore';

class Idle {
  ticks = 0;
}

class Busy {
  constructor(public job = 'none') {}
}

class Done {
  constructor(public result = 0) {}
}

type Stages = [Idle, Busy, Done];

const createStore = () => StateStore.of<Stages>([new Idle(), new Busy('build'), new Done(7)]);

describe('RuntimeSelector', () => {
  it('selects the state declared at every position', () => {
    const store = createStore();
    const selector = createRuntimeSelector<Stages>(3);

    const values = store.values();
    for (const position of [0, 1, 2]) {
      const ref = selector.select(store, position);
      expect(ref.index).toBe(position);
      expect(ref.state).toBe(values[position]);
    }
  });

  it('re-derives references for a copied store from the position alone', () => {
    const store = createStore();
    const copy = store.clone();
    const selector = createRuntimeSelector<Stages>(3);

    const original = selector.select(store, 1);
    const copied = selector.select(copy, original.index);

    expect(copied.index).toBe(1);
    expect(copied.state).toBeInstanceOf(Busy);
    expect(copied.state).not.toBe(original.state);
    expect(copied.state).toBe(copy.at(1));
  });

  it('rejects positions outside the table', () => {
    const store = createStore();
    const selector = createRuntimeSelector<Stages>(3);

    expect(() => selector.select(store, 3)).toThrow(InvalidPositionError);
    expect(() => selector.select(store, -1)).toThrow(InvalidPositionError);
    expect(() => selector.select(store, 1.5)).toThrow('Position 1.5 is outside [0, 3)');
  });

  it('rejects a store of another arity', () => {
    const selector = createRuntimeSelector<Stages>(2);

    expect(() => selector.select(createStore(), 0)).toThrow(InvalidPositionError);
  });

  it('narrows tagged references by position', () => {
    const ref = createRuntimeSelector<Stages>(3).select(createStore(), 2);

    expect(isStateRef(ref, 2)).toBe(true);
    expect(isStateRef(ref, 0)).toBe(false);
    if (isStateRef(ref, 2)) {
      expect(ref.state.result).toBe(7);
    }
  });
});

describe('runtimeGet', () => {
  it('reads any tuple by position', () => {
    const tuple = ['a', 2, true] as const;

    expect(runtimeGet(tuple, 1)).toEqual({ index: 1, value: 2 });
    expect(runtimeGet(tuple, 2).value).toBe(true);
  });

  it('reads pairs', () => {
    const pair: [string, number] = ['left', 5];

    expect(runtimeGet(pair, 0).value).toBe('left');
    expect(runtimeGet(pair, 1).value).toBe(5);
  });

  it('rejects positions past the end', () => {
    expect(() => runtimeGet(['only'], 1)).toThrow(InvalidPositionError);
  });
});
