/**
 * Core types shared by the store, the action algebra and the machine
 */

/**
 * Base event shape - every event carries a literal `type` discriminant
 */
export type AnyEvent = { readonly type: string };

/**
 * Extract a specific event from an event union
 */
export type PickEvent<E extends AnyEvent, T extends E['type']> = Extract<E, { type: T }>;

/**
 * Constructor of a state. Any class can be a state.
 */
export type StateClass<S = object> = new (...args: never[]) => S;

/**
 * Union of the valid positions of a tuple: `Position<[A, B, C]>` is `0 | 1 | 2`
 */
export type Position<T extends readonly unknown[]> = Extract<
  Exclude<Partial<T>['length'], T['length']>,
  number
>;

/**
 * Instance types of a tuple of state classes, in the same order
 */
export type InstancesOf<Classes extends readonly StateClass[]> = {
  [K in keyof Classes]: Classes[K] extends StateClass<infer S> ? S : never;
};

/**
 * Tagged reference - the position of one stored state plus the state itself
 */
export interface StateRef<
  States extends readonly object[],
  P extends Position<States> = Position<States>,
> {
  readonly index: P;
  readonly state: States[P];
}

export type ActionKind = 'nothing' | 'transition' | 'one-of';

/**
 * Minimal surface actions need from a machine
 */
export interface Transitions {
  /**
   * Make `target` current. `event` is the event that triggered the transition, if any.
   */
  transitionTo<S extends object>(target: StateClass<S>, event?: AnyEvent): S;
}

/**
 * Action - an effect a handler asks the machine to perform
 */
export interface Action {
  readonly kind: ActionKind;
  apply(machine: Transitions, state: object, event: AnyEvent): void;
}

/**
 * Handler - maps one event to exactly one action
 */
export type Handler<E extends AnyEvent, A extends Action = Action> = (event: E) => A;

/**
 * What a state must provide to live in a machine handling events `E`
 */
export interface MachineState<E extends AnyEvent> {
  handle: (event: E) => Action;
  onEnter?: (event: E) => void;
}

/**
 * A state with an entry operation
 */
export interface Enterable {
  onEnter(event: AnyEvent): void;
}
