export { Nothing, nothing } from './Nothing';
export { TransitionTo, transitionTo } from './TransitionTo';
export { OneOf, Maybe, oneOf, maybe } from './OneOf';
export { ByDefault, byDefault } from './ByDefault';
export { On } from './On';
export type { ActionFactory } from './On';
export { buildWill } from './Will';
export type { Will, AnyOn, ActionOf, DuplicateType, DuplicateEventMapping, MappedEvents } from './Will';
export { HandlerKit, createHandlers } from './handlers';
export { isAction, isEnterable } from './guards';
