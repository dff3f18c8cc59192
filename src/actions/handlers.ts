import type { Action, AnyEvent, PickEvent } from '../types';
import { ByDefault } from './ByDefault';
import { On, type ActionFactory } from './On';
import { buildWill, type ActionOf, type AnyOn, type MappedEvents, type Will } from './Will';

/**
 * Handler combinators bound to one event union, so that mapped events are
 * narrowed for their action factories
 */
export class HandlerKit<E extends AnyEvent> {
  /**
   * Map event type `type` to an action, or to a factory building it from the event
   */
  on<T extends E['type'], A extends Action>(
    type: T,
    action: A | ActionFactory<PickEvent<E, T>, A>
  ): On<T, PickEvent<E, T>, A> {
    return new On(type, action);
  }

  byDefault<A extends Action>(action: A): ByDefault<A> {
    return new ByDefault(action);
  }

  /**
   * One handler for every event: the mapping for its type, else the default.
   * Pass `null` instead of a default to accept only the mapped events.
   */
  will<D extends Action, Ms extends readonly AnyOn<E>[]>(
    fallback: ByDefault<D>,
    ...mappings: Ms
  ): Will<E, D | ActionOf<Ms[number]>, Ms>;
  will<Ms extends readonly AnyOn<E>[]>(
    fallback: null,
    ...mappings: Ms
  ): Will<MappedEvents<E, Ms>, ActionOf<Ms[number]>, Ms>;
  will(fallback: ByDefault<Action> | null, ...mappings: readonly AnyOn<E>[]): unknown {
    return buildWill(fallback, mappings);
  }
}

export function createHandlers<E extends AnyEvent>(): HandlerKit<E> {
  return new HandlerKit<E>();
}
