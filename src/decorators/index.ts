/**
 * Decorators for state methods
 */

import { DuplicateEventMappingError } from '../errors';

type MethodsByEvent = Map<string, string>;

const handleMethods = new WeakMap<object, MethodsByEvent>();
const entryMethods = new WeakMap<object, MethodsByEvent>();

const classNameOf = (ctor: object): string => {
  return typeof ctor === 'function' && ctor.name ? ctor.name : 'anonymous state';
};

const register = (
  store: WeakMap<object, MethodsByEvent>,
  ctor: object,
  eventType: string,
  methodName: string
): void => {
  let methods = store.get(ctor);
  if (!methods) {
    methods = new Map();
    store.set(ctor, methods);
  }

  const existing = methods.get(eventType);
  if (existing !== undefined && existing !== methodName) {
    throw new DuplicateEventMappingError(eventType, classNameOf(ctor));
  }
  methods.set(eventType, methodName);
};

const lookup = (store: WeakMap<object, MethodsByEvent>, ctor: unknown, eventType: string): string | undefined => {
  let current = ctor;
  while (typeof current === 'function') {
    const methodName = store.get(current)?.get(eventType);
    if (methodName !== undefined) {
      return methodName;
    }
    current = Object.getPrototypeOf(current);
  }
  return undefined;
};

const decorate = (store: WeakMap<object, MethodsByEvent>, eventType: string) => {
  return function stateMethodDecorator(
    targetOrValue: unknown,
    propertyKeyOrContext: string | symbol | ClassMethodDecoratorContext<unknown>,
    _descriptor?: PropertyDescriptor
  ): PropertyDescriptor | void {
    if (typeof propertyKeyOrContext === 'string' || typeof propertyKeyOrContext === 'symbol') {
      if (typeof targetOrValue === 'object' && targetOrValue !== null) {
        register(store, targetOrValue.constructor, eventType, propertyKeyOrContext.toString());
      }
      return;
    }

    const context = propertyKeyOrContext;
    if (!context || context.kind !== 'method') {
      return;
    }

    context.addInitializer(function (this: unknown) {
      if (typeof this === 'object' && this !== null) {
        register(store, this.constructor, eventType, String(context.name));
      }
    });
  };
};

/**
 * Mark a state method as the handler for one event type
 */
export function HandleMethod(eventType: string) {
  return decorate(handleMethods, eventType);
}

/**
 * Mark a state method as the entry operation for one triggering event type
 */
export function EntryMethod(eventType: string) {
  return decorate(entryMethods, eventType);
}

/**
 * Name of the method handling `eventType` on a state class, inherited mappings included
 */
export function getHandleMethod(stateClass: unknown, eventType: string): string | undefined {
  return lookup(handleMethods, stateClass, eventType);
}

export function getEntryMethod(stateClass: unknown, eventType: string): string | undefined {
  return lookup(entryMethods, stateClass, eventType);
}

/**
 * Event types handled by decorated methods of a state class
 */
export function getHandledEvents(stateClass: unknown): string[] {
  const events = new Set<string>();
  let current = stateClass;
  while (typeof current === 'function') {
    for (const eventType of handleMethods.get(current)?.keys() ?? []) {
      events.add(eventType);
    }
    current = Object.getPrototypeOf(current);
  }
  return [...events];
}
