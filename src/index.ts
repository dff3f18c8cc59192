export { Machine } from './Machine';
export type { MachineOptions } from './Machine';
export { MachineDefinition, defineMachine } from './MachineDefinition';
export type { DefaultConstructible } from './MachineDefinition';
export { State } from './State';
export { HandleMethod, EntryMethod, getHandleMethod, getEntryMethod, getHandledEvents } from './decorators';
export {
  SwitchyardError,
  ConfigurationError,
  DuplicateStateError,
  DuplicateEventMappingError,
  StateMismatchError,
  UncopyableStateError,
  UndeclaredStateError,
  InvalidPositionError,
  InvalidActionError,
  MachineMovedError,
  UnhandledEventError,
} from './errors';
export { Switchyard, resolveLogLevel } from './config/global';
export type {
  SwitchyardGlobalConfig,
  SwitchyardLogger,
  MachineLifecycleHooks,
  LogLevel,
} from './config/global';

export * from './actions';
export * from './types';
export { StateStore, copyState } from './runtime/StateStore';
export { StateLayout } from './runtime/layout';
export { RuntimeSelector, createRuntimeSelector, runtimeGet, isStateRef } from './runtime/selector';
export type { Accessor, TupleRef } from './runtime/selector';
export * from './runtime/ids';
