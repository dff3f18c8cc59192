import type { Action, AnyEvent } from '../types';

/**
 * Handler adapter producing the same action for every event
 */
export class ByDefault<A extends Action> {
  constructor(readonly action: A) {}

  handle(_event: AnyEvent): A {
    return this.action;
  }
}

export function byDefault<A extends Action>(action: A): ByDefault<A> {
  return new ByDefault(action);
}
