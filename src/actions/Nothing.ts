import type { Action, AnyEvent, Transitions } from '../types';

/**
 * Action with no effect - the current state stays current
 */
export class Nothing implements Action {
  readonly kind = 'nothing';

  apply(_machine: Transitions, _state: object, _event: AnyEvent): void {
    /* noop */
  }
}

export const nothing = new Nothing();
