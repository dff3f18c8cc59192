import { Machine, type MachineOptions } from './Machine';
import { StateLayout } from './runtime/layout';
import { StateStore } from './runtime/StateStore';
import type { AnyEvent, InstancesOf, MachineState, StateClass } from './types';

/**
 * Resolves to `[]` when every class has a zero-argument constructor, so that
 * `createDefault()` only type-checks for such machines
 */
export type DefaultConstructible<Classes extends readonly StateClass[]> = Classes[number] extends new () => object
  ? []
  : [requiresArguments: 'every state class needs a zero-argument constructor'];

/**
 * Declared, ordered list of distinct state classes handling events `E`
 */
export class MachineDefinition<E extends AnyEvent, Classes extends readonly StateClass<MachineState<E>>[]> {
  private readonly layout: StateLayout<InstancesOf<Classes>>;

  constructor(readonly classes: Classes, private readonly options: MachineOptions = {}) {
    this.layout = new StateLayout<InstancesOf<Classes>>(classes);
  }

  get size(): number {
    return this.layout.arity;
  }

  /**
   * Build a machine from one instance per declared class, in declared order.
   * The first state is current.
   */
  create(...states: InstancesOf<Classes>): Machine<E, InstancesOf<Classes>> {
    this.layout.verify(states);
    return new Machine(this.layout, StateStore.of(states), { ...this.options });
  }

  /**
   * Build a machine whose states are all default-constructed
   */
  createDefault(..._check: DefaultConstructible<Classes>): Machine<E, InstancesOf<Classes>> {
    return new Machine(this.layout, StateStore.defaults(this.classes), { ...this.options });
  }

  /**
   * Same declaration, other machine options
   */
  withOptions(options: MachineOptions): MachineDefinition<E, Classes> {
    return new MachineDefinition<E, Classes>(this.classes, { ...this.options, ...options });
  }
}

/**
 * Declare the states of a machine handling events `E`:
 *
 * ```ts
 * const Door = defineMachine<DoorEvent>()(ClosedState, OpenState, LockedState);
 * const door = Door.create(new ClosedState(), new OpenState(), new LockedState(0));
 * ```
 */
export function defineMachine<E extends AnyEvent>(options: MachineOptions = {}) {
  return <Classes extends readonly StateClass<MachineState<E>>[]>(
    ...classes: Classes
  ): MachineDefinition<E, Classes> => new MachineDefinition<E, Classes>(classes, options);
}
