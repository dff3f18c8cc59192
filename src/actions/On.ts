import type { Action, AnyEvent } from '../types';

interface ActionSource<Ev extends AnyEvent, A extends Action> {
  produce(event: Ev): A;
}

export type ActionFactory<Ev extends AnyEvent, A extends Action> = (event: Ev) => A;

const isActionFactory = <Ev extends AnyEvent, A extends Action>(
  action: A | ActionFactory<Ev, A>
): action is ActionFactory<Ev, A> => typeof action === 'function';

/**
 * Maps one event type to an action. The action is either a ready value or
 * built from the event, so transition data can flow out of it.
 */
export class On<T extends string, Ev extends AnyEvent, A extends Action> {
  private readonly source: ActionSource<Ev, A>;

  constructor(readonly type: T, action: A | ActionFactory<Ev, A>) {
    if (isActionFactory(action)) {
      this.source = { produce: action };
    } else {
      const value = action;
      this.source = { produce: () => value };
    }
  }

  handle(event: Ev): A {
    return this.source.produce(event);
  }
}
