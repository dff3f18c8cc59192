import type { Action, AnyEvent, Transitions } from '../types';
import { Nothing, nothing } from './Nothing';

/**
 * Runtime union of actions. Holds exactly one alternative and forwards to it.
 */
export class OneOf<Options extends readonly Action[]> implements Action {
  readonly kind = 'one-of';

  constructor(readonly option: Options[number]) {}

  apply(machine: Transitions, state: object, event: AnyEvent): void {
    this.option.apply(machine, state, event);
  }
}

/**
 * `A` or nothing at all
 */
export class Maybe<A extends Action> extends OneOf<[A, Nothing]> {
  static when<A extends Action>(condition: boolean, action: A): Maybe<A> {
    return new Maybe<A>(condition ? action : nothing);
  }
}

export function oneOf<Options extends readonly Action[]>(option: Options[number]): OneOf<Options> {
  return new OneOf<Options>(option);
}

export function maybe<A extends Action>(option: A | Nothing): Maybe<A> {
  return new Maybe<A>(option);
}
