import { byDefault, type ByDefault } from './actions/ByDefault';
import { isAction } from './actions/guards';
import { nothing } from './actions/Nothing';
import { getEntryMethod, getHandleMethod } from './decorators';
import { InvalidActionError } from './errors';
import type { Action, AnyEvent } from './types';

const invokeMethod = (state: object, methodName: string, event: AnyEvent): unknown => {
  const method: unknown = Reflect.get(state, methodName);
  if (typeof method !== 'function') {
    throw new InvalidActionError(event.type, state.constructor.name);
  }
  return Reflect.apply(method, state, [event]);
};

/**
 * Base class for states declared with `@HandleMethod` / `@EntryMethod`.
 *
 * `handle` runs the method decorated for the event's type and falls back to
 * the default action (nothing, unless another is given) for every other event.
 * `onEnter` runs the entry method decorated for the triggering event's type.
 */
export abstract class State<E extends AnyEvent> {
  private readonly defaultAction: ByDefault<Action>;

  constructor(fallback: ByDefault<Action> = byDefault(nothing)) {
    this.defaultAction = fallback;
  }

  handle(event: E): Action {
    const methodName = getHandleMethod(this.constructor, event.type);
    if (methodName === undefined) {
      return this.defaultAction.handle(event);
    }

    const action = invokeMethod(this, methodName, event);
    if (!isAction(action)) {
      throw new InvalidActionError(event.type, this.constructor.name);
    }
    return action;
  }

  onEnter(event: E): void {
    const methodName = getEntryMethod(this.constructor, event.type);
    if (methodName !== undefined) {
      invokeMethod(this, methodName, event);
    }
  }
}
