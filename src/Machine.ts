import {
  Switchyard,
  type LogLevel,
  type MachineLifecycleHooks,
  type SwitchyardLogger,
} from './config/global';
import { MachineMovedError, UndeclaredStateError } from './errors';
import { generateMachineId } from './runtime/ids';
import type { StateLayout } from './runtime/layout';
import {
  createLoggerFromConfig,
  createStructuredLogger,
  getLogger,
  type Logger,
} from './runtime/logger';
import type { StateStore } from './runtime/StateStore';
import type { AnyEvent, MachineState, Position, StateClass, StateRef, Transitions } from './types';

export interface MachineOptions {
  id?: string;
  logger?: SwitchyardLogger;
  logLevel?: LogLevel;
  hooks?: MachineLifecycleHooks;
}

interface Slot<States extends readonly object[]> {
  store: StateStore<States>;
  current: StateRef<States>;
}

/**
 * Finite-state machine owning one instance of each declared state.
 *
 * Exactly one state is current. `handle` asks it for an action and applies
 * that action; a `TransitionTo` action is the only way handling an event
 * changes the current state.
 */
export class Machine<E extends AnyEvent, States extends readonly MachineState<E>[]> {
  readonly id: string;

  /**
   * Transition surface handed to actions
   */
  readonly transitions: Transitions;

  private slot: Slot<States> | null;
  private readonly logger: Logger;
  private readonly hooks: MachineLifecycleHooks;

  constructor(
    private readonly layout: StateLayout<States>,
    store: StateStore<States>,
    private readonly options: MachineOptions = {},
    position = 0
  ) {
    this.id = options.id ?? generateMachineId();
    this.slot = { store, current: layout.selector.select(store, position) };

    const base = options.logger ? createLoggerFromConfig(options.logger, options.logLevel) : getLogger();
    this.logger = createStructuredLogger({ machineId: this.id }, base);
    this.hooks = options.hooks ?? Switchyard.getActive()?.getLifecycleHooks() ?? {};

    this.transitions = {
      transitionTo: <S extends object>(target: StateClass<S>, event?: AnyEvent): S => this.moveTo(target, event),
    };
  }

  /**
   * Copy construction: fresh id, value-wise copy of every state, same current position
   */
  static copy<E extends AnyEvent, States extends readonly MachineState<E>[]>(
    source: Machine<E, States>,
    options: MachineOptions = {}
  ): Machine<E, States> {
    const { store, current } = source.occupied();
    return new Machine<E, States>(
      source.layout,
      store.clone(),
      { ...source.options, id: undefined, ...options },
      current.index
    );
  }

  /**
   * Move construction: the states change owner, the source is left unusable
   */
  static move<E extends AnyEvent, States extends readonly MachineState<E>[]>(
    source: Machine<E, States>
  ): Machine<E, States> {
    const { store, current } = source.occupied();
    const machine = new Machine<E, States>(
      source.layout,
      store,
      { ...source.options, id: source.id },
      current.index
    );
    source.slot = null;
    return machine;
  }

  clone(options?: MachineOptions): Machine<E, States> {
    return Machine.copy(this, options);
  }

  /**
   * Copy assignment
   */
  assign(source: Machine<E, States>): this {
    if (source === this) {
      return this;
    }
    const { store, current } = source.occupied();
    this.replace(store.clone(), current.index);
    return this;
  }

  /**
   * Move assignment
   */
  moveFrom(source: Machine<E, States>): this {
    if (source === this) {
      return this;
    }
    const { store, current } = source.occupied();
    this.replace(store, current.index);
    source.slot = null;
    return this;
  }

  get current(): StateRef<States> {
    return this.occupied().current;
  }

  get index(): Position<States> {
    return this.occupied().current.index;
  }

  get currentState(): States[Position<States>] {
    return this.occupied().current.state;
  }

  get currentName(): string {
    return this.layout.nameAt(this.index);
  }

  get moved(): boolean {
    return this.slot === null;
  }

  /**
   * Whether `target` is the current state
   */
  is<S extends States[number]>(target: StateClass<S>): boolean {
    return this.layout.positionOf(target) === this.index;
  }

  /**
   * The machine's own instance of `target`, current or not
   */
  get<S extends States[number]>(target: StateClass<S>): S {
    return this.resolve(target).state;
  }

  states(): ReadonlyArray<States[number]> {
    return this.occupied().store.values();
  }

  /**
   * Make `target` current and return it. Entry operations do not run.
   */
  transitionTo<S extends States[number]>(target: StateClass<S>): S {
    return this.moveTo(target);
  }

  /**
   * Dispatch one event to the current state and apply the action it returns
   */
  handle(event: E): void {
    this.handleBy(event, this.transitions);
  }

  /**
   * Ask the current state for an action and apply it to `target`
   */
  handleBy(event: E, target: Transitions): void {
    const { current } = this.occupied();
    const { state } = current;
    const action = state.handle(event);

    this.logger.debug(`${event.type} -> ${action.kind}`, { state: this.layout.nameAt(current.index) });
    this.hooks.onHandle?.(this.id, this.layout.nameAt(current.index), event, action);

    action.apply(target, state, event);
  }

  private occupied(): Slot<States> {
    if (!this.slot) {
      throw new MachineMovedError(this.id);
    }
    return this.slot;
  }

  private replace(store: StateStore<States>, position: number): void {
    this.slot = { store, current: this.layout.selector.select(store, position) };
  }

  private resolve<S extends object>(target: StateClass<S>): { slot: Slot<States>; ref: StateRef<States>; state: S } {
    const slot = this.occupied();
    const position = this.layout.positionOf(target);
    if (position === undefined) {
      throw new UndeclaredStateError(target.name);
    }

    const ref = this.layout.selector.select(slot.store, position);
    const { state } = ref;
    if (!(state instanceof target)) {
      throw new UndeclaredStateError(target.name);
    }
    return { slot, ref, state };
  }

  private moveTo<S extends object>(target: StateClass<S>, event?: AnyEvent): S {
    const { slot, ref, state } = this.resolve(target);
    const from = this.layout.nameAt(slot.current.index);
    const to = this.layout.nameAt(ref.index);

    slot.current = ref;

    this.logger.debug(`transition ${from} -> ${to}`, event ? { event: event.type } : {});
    this.hooks.onTransition?.(this.id, from, to, event);
    return state;
  }
}
