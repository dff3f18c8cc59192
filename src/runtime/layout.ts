import { ConfigurationError, DuplicateStateError, StateMismatchError, UncopyableStateError } from '../errors';
import type { StateClass } from '../types';
import { RuntimeSelector, createRuntimeSelector } from './selector';
import { isCopyable, nameOf } from './StateStore';

/**
 * Declared state list of a machine: order, class -> position index and the
 * runtime selector table. Built and validated once per definition.
 */
export class StateLayout<States extends readonly object[]> {
  readonly selector: RuntimeSelector<States>;
  private readonly positions = new Map<StateClass, number>();

  constructor(readonly classes: readonly StateClass[]) {
    if (classes.length === 0) {
      throw new ConfigurationError('A machine needs at least one state');
    }

    classes.forEach((StateType, position) => {
      if (this.positions.has(StateType)) {
        throw new DuplicateStateError(StateType.name);
      }
      if (!isCopyable(StateType)) {
        throw new UncopyableStateError(StateType.name);
      }
      this.positions.set(StateType, position);
    });

    this.selector = createRuntimeSelector<States>(classes.length);
  }

  get arity(): number {
    return this.classes.length;
  }

  /**
   * Position of exactly `target`; subclasses of a declared class are not matched
   */
  positionOf(target: StateClass): number | undefined {
    return this.positions.get(target);
  }

  nameAt(position: number): string {
    return this.classes[position]?.name ?? `#${position}`;
  }

  /**
   * Every value must be an instance of the class declared at its position
   */
  verify(states: readonly object[]): void {
    if (states.length !== this.classes.length) {
      throw new ConfigurationError(`Expected ${this.classes.length} states, got ${states.length}`);
    }

    states.forEach((state, position) => {
      const StateType = this.classes[position];
      if (!(state instanceof StateType)) {
        throw new StateMismatchError(position, StateType.name, nameOf(state));
      }
    });
  }
}
