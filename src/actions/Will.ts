import { DuplicateEventMappingError, UnhandledEventError } from '../errors';
import type { Action, AnyEvent, Handler, PickEvent } from '../types';
import type { ByDefault } from './ByDefault';
import type { On } from './On';

export type AnyOn<E extends AnyEvent> = On<E['type'], E, Action>;

/**
 * Action produced by a mapping
 */
export type ActionOf<M> = M extends On<string, never, infer A extends Action> ? A : never;

/**
 * First event type mapped twice in `Ms`, or never
 */
export type DuplicateType<
  Ms extends readonly { readonly type: string }[],
  Seen extends string = never,
> = Ms extends readonly [
  infer Head extends { readonly type: string },
  ...infer Rest extends readonly { readonly type: string }[],
]
  ? Head['type'] extends Seen
    ? Head['type']
    : DuplicateType<Rest, Seen | Head['type']>
  : never;

/**
 * Stands in for a handler when one event type is mapped twice
 */
export interface DuplicateEventMapping<T extends string> {
  readonly duplicateEventMapping: T;
}

export type Will<
  E extends AnyEvent,
  A extends Action,
  Ms extends readonly { readonly type: string }[],
> = [DuplicateType<Ms>] extends [never] ? Handler<E, A> : DuplicateEventMapping<DuplicateType<Ms>>;

/**
 * Compose an optional default with per-event mappings into one handler
 */
export function buildWill<E extends AnyEvent>(
  fallback: ByDefault<Action> | null,
  mappings: readonly AnyOn<E>[]
): Handler<E> {
  const table = new Map<string, AnyOn<E>>();
  for (const mapping of mappings) {
    if (table.has(mapping.type)) {
      throw new DuplicateEventMappingError(mapping.type);
    }
    table.set(mapping.type, mapping);
  }

  return (event: E): Action => {
    const mapping = table.get(event.type);
    if (mapping) {
      return mapping.handle(event);
    }
    if (fallback) {
      return fallback.handle(event);
    }
    throw new UnhandledEventError(event.type);
  };
}

/**
 * Events accepted by a `Will` without a default
 */
export type MappedEvents<E extends AnyEvent, Ms extends readonly AnyOn<E>[]> = PickEvent<E, Ms[number]['type']>;
