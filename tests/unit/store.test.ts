/**
 * Unit tests for the heterogeneous state store
 */

import { StateMismatchError, UncopyableStateError } from '../../src/errors';
import { StateStore, copyState, isCopyable } from '../../src/runtime/StateStore';

class Counter {
  count = 0;
}

class Label {
  constructor(public text = 'idle') {}
}

class Point {
  constructor(public x = 0, public y = 0) {}
}

class Bag {
  items: number[] = [];
  tags = new Map<string, string[]>();
  seen = new Set<number>();
  origin = new Point(2, 3);
  createdAt = new Date(0);
}

class Keyed {
  key = 1;
  readonly rekey = (key: number): void => {
    this.key = key;
  };
}

class Sealed {
  #secret = 5;

  reveal(): number {
    return this.#secret;
  }
}

class Linked {
  self: Linked | null = null;
}

class Keyholder {
  constructor(readonly key: number) {}
}

class Snapshot {
  constructor(public items: number[] = []) {}

  clone(): Snapshot {
    return new Snapshot([...this.items]);
  }
}

describe('StateStore', () => {
  it('holds one value per declared type, in declared order', () => {
    const store = StateStore.of<[Counter, Label]>([new Counter(), new Label('ready')]);

    expect(store.size).toBe(2);
    expect(store.at(0)).toBeInstanceOf(Counter);
    expect(store.at(1).text).toBe('ready');
  });

  it('default-constructs every declared class', () => {
    const store = StateStore.defaults([Counter, Label] as const);

    expect(store.at(0).count).toBe(0);
    expect(store.at(1).text).toBe('idle');
  });

  it('validates positions', () => {
    const store = StateStore.of<[Counter, Label]>([new Counter(), new Label()]);

    expect(store.isPosition(0)).toBe(true);
    expect(store.isPosition(1)).toBe(true);
    expect(store.isPosition(2)).toBe(false);
    expect(store.isPosition(-1)).toBe(false);
    expect(store.isPosition(0.5)).toBe(false);
  });

  it('returns a snapshot of its values', () => {
    const counter = new Counter();
    const store = StateStore.of<[Counter]>([counter]);

    const values = store.values();
    expect(values).toEqual([counter]);
    expect(values[0]).toBe(counter);
  });

  describe('clone', () => {
    it('copies every member without sharing instances', () => {
      const store = StateStore.of<[Counter, Label]>([new Counter(), new Label('ready')]);
      store.at(0).count = 3;

      const copy = store.clone();

      expect(copy.at(0)).not.toBe(store.at(0));
      expect(copy.at(0)).toBeInstanceOf(Counter);
      expect(copy.at(0).count).toBe(3);
      expect(copy.at(1).text).toBe('ready');

      copy.at(0).count = 10;
      expect(store.at(0).count).toBe(3);
    });

    it('uses clone() when a state defines it', () => {
      const store = StateStore.of<[Snapshot]>([new Snapshot([1])]);

      const copy = store.clone();
      copy.at(0).items.push(2);

      expect(store.at(0).items).toEqual([1]);
      expect(copy.at(0).items).toEqual([1, 2]);
    });
  });
});

describe('copyState', () => {
  it('rebuilds states without clone() on their own prototype', () => {
    const label = new Label('on');
    const copy = copyState(label, 0);

    expect(copy).not.toBe(label);
    expect(copy).toBeInstanceOf(Label);
    expect(copy.text).toBe('on');
  });

  it('deep-copies nested data', () => {
    const bag = new Bag();
    bag.items.push(1);
    bag.tags.set('colour', ['red']);
    bag.seen.add(4);

    const copy = copyState(bag, 0);
    copy.items.push(2);
    copy.tags.get('colour')?.push('blue');
    copy.seen.add(5);
    copy.origin.x = 10;
    copy.createdAt.setTime(1000);

    expect(bag.items).toEqual([1]);
    expect(bag.tags.get('colour')).toEqual(['red']);
    expect([...bag.seen]).toEqual([4]);
    expect(bag.origin.x).toBe(2);
    expect(bag.createdAt.getTime()).toBe(0);
    expect(copy.origin).toBeInstanceOf(Point);
    expect(copy.items).toEqual([1, 2]);
  });

  it('gives the copy its own closures over this', () => {
    const keyed = new Keyed();

    const copy = copyState(keyed, 0);
    copy.rekey(9);

    expect(copy.key).toBe(9);
    expect(keyed.key).toBe(1);
  });

  it('rebuilds private fields through the constructor', () => {
    const copy = copyState(new Sealed(), 0);

    expect(copy.reveal()).toBe(5);
  });

  it('points self references at the copy', () => {
    const linked = new Linked();
    linked.self = linked;

    const copy = copyState(linked, 0);

    expect(copy.self).toBe(copy);
  });

  it('rejects a state that cannot be rebuilt without arguments', () => {
    expect(() => copyState(new Keyholder(3), 0)).toThrow(UncopyableStateError);
    expect(() => copyState(new Keyholder(3), 0)).toThrow(
      'State Keyholder needs a clone() method or a zero-argument constructor'
    );
  });

  it('rejects a clone() that returns the same instance', () => {
    class SelfCloning {
      clone(): SelfCloning {
        return this;
      }
    }

    expect(() => copyState(new SelfCloning(), 4)).toThrow(StateMismatchError);
  });

  it('rejects a clone() that returns another type', () => {
    class Shapeshifter {
      clone(): Label {
        return new Label();
      }
    }

    expect(() => copyState(new Shapeshifter(), 1)).toThrow(
      'Expected an instance of Shapeshifter at position 1, got Label'
    );
  });
});

describe('isCopyable', () => {
  it('accepts classes with clone() or a zero-argument constructor', () => {
    expect(isCopyable(Snapshot)).toBe(true);
    expect(isCopyable(Label)).toBe(true);
    expect(isCopyable(Keyholder)).toBe(false);
  });
});
