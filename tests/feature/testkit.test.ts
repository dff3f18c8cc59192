import { Switchyard } from '../../src';
import { TestKit } from '../../src/test/TestKit';
import { ClosedState, LockedState, OpenState, createDoor } from '../fixtures/door';

describe('TestKit', () => {
  beforeEach(() => {
    TestKit.fake();
  });

  afterEach(() => {
    TestKit.restore();
  });

  it('records handled events and transitions', () => {
    const door = createDoor();

    door.handle({ type: 'lock', newKey: 1234 });
    door.handle({ type: 'unlock', key: 2 });
    door.handle({ type: 'unlock', key: 1234 });

    expect(TestKit.isFake()).toBe(true);
    expect(TestKit.handled()).toEqual([
      { machineId: door.id, state: 'ClosedState', eventType: 'lock', actionKind: 'transition' },
      { machineId: door.id, state: 'LockedState', eventType: 'unlock', actionKind: 'one-of' },
      { machineId: door.id, state: 'LockedState', eventType: 'unlock', actionKind: 'one-of' },
    ]);
    expect(TestKit.transitions()).toEqual([
      { machineId: door.id, from: 'ClosedState', to: 'LockedState', eventType: 'lock' },
      { machineId: door.id, from: 'LockedState', to: 'ClosedState', eventType: 'unlock' },
    ]);

    TestKit.assertTransitioned(ClosedState, LockedState, 1);
    TestKit.assertTransitioned(LockedState, ClosedState);
    TestKit.assertCurrent(door, ClosedState);
  });

  it('fails assertions that do not hold', () => {
    const door = createDoor();

    TestKit.assertNoTransitions();
    expect(() => TestKit.assertTransitioned(ClosedState, OpenState)).toThrow(
      'Expected ClosedState -> OpenState at least once, but it never happened'
    );

    door.handle({ type: 'open' });

    expect(() => TestKit.assertNoTransitions()).toThrow('Expected no transitions, but saw: ClosedState -> OpenState');
    expect(() => TestKit.assertTransitioned(ClosedState, OpenState, 2)).toThrow(
      'Expected ClosedState -> OpenState 2 times, but it happened 1 times'
    );
    expect(() => TestKit.assertCurrent(door, ClosedState)).toThrow(
      `Expected machine ${door.id} to be in ClosedState, but it is in OpenState`
    );
  });

  it('silences logging and drops the configuration on restore', () => {
    expect(Switchyard.getActive()?.getLogLevel()).toBe('silent');

    TestKit.restore();

    expect(TestKit.isFake()).toBe(false);
    expect(Switchyard.getActive()).toBeNull();
    expect(TestKit.transitions()).toEqual([]);
  });
});
