import type { Action, ActionKind, Enterable } from '../types';

const ACTION_KINDS: readonly ActionKind[] = ['nothing', 'transition', 'one-of'];

export function isAction(value: unknown): value is Action {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  if (!('kind' in value) || !('apply' in value) || typeof value.apply !== 'function') {
    return false;
  }

  const { kind } = value;
  return ACTION_KINDS.some(candidate => candidate === kind);
}

export function isEnterable(state: object): state is Enterable {
  return 'onEnter' in state && typeof state.onEnter === 'function';
}
