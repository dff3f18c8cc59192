import type { Action, AnyEvent, StateClass, Transitions } from '../types';
import { isEnterable } from './guards';

/**
 * Make `S` current, then run its entry operation (if it has one) with the
 * event that triggered the transition
 */
export class TransitionTo<S extends object> implements Action {
  readonly kind = 'transition';

  constructor(readonly target: StateClass<S>) {}

  apply(machine: Transitions, _state: object, event: AnyEvent): void {
    const state = machine.transitionTo(this.target, event);
    if (isEnterable(state)) {
      state.onEnter(event);
    }
  }
}

export function transitionTo<S extends object>(target: StateClass<S>): TransitionTo<S> {
  return new TransitionTo(target);
}
