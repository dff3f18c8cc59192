/**
 * Base class for every error raised by the engine
 */
export class SwitchyardError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SwitchyardError';
  }
}

/**
 * A machine or handler declaration is invalid. Raised once, while the
 * declaration is built, never while events are handled.
 */
export class ConfigurationError extends SwitchyardError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class DuplicateStateError extends ConfigurationError {
  constructor(public stateName: string) {
    super(`State ${stateName} is declared more than once`);
    this.name = 'DuplicateStateError';
  }
}

export class DuplicateEventMappingError extends ConfigurationError {
  constructor(public eventType: string, owner?: string) {
    super(
      owner
        ? `Event "${eventType}" is mapped more than once in ${owner}`
        : `Event "${eventType}" is mapped more than once`
    );
    this.name = 'DuplicateEventMappingError';
  }
}

/**
 * A value passed to `create` is not an instance of the class declared at its position
 */
export class StateMismatchError extends ConfigurationError {
  constructor(public position: number, public expected: string, public received: string) {
    super(`Expected an instance of ${expected} at position ${position}, got ${received}`);
    this.name = 'StateMismatchError';
  }
}

/**
 * A declared state can neither copy itself nor be rebuilt without arguments
 */
export class UncopyableStateError extends ConfigurationError {
  constructor(public stateName: string) {
    super(`State ${stateName} needs a clone() method or a zero-argument constructor`);
    this.name = 'UncopyableStateError';
  }
}

export class UndeclaredStateError extends SwitchyardError {
  constructor(public stateName: string) {
    super(`State ${stateName} is not declared in this machine`);
    this.name = 'UndeclaredStateError';
  }
}

export class InvalidPositionError extends SwitchyardError {
  constructor(public position: number, public size: number) {
    super(`Position ${position} is outside [0, ${size})`);
    this.name = 'InvalidPositionError';
  }
}

/**
 * A decorated handler returned something that is not an action
 */
export class InvalidActionError extends SwitchyardError {
  constructor(public eventType: string, public stateName: string) {
    super(`Handler for "${eventType}" on ${stateName} did not return an action`);
    this.name = 'InvalidActionError';
  }
}

export class MachineMovedError extends SwitchyardError {
  constructor(public machineId: string) {
    super(`Machine ${machineId} was moved and can no longer be used`);
    this.name = 'MachineMovedError';
  }
}

/**
 * An event reached a handler that neither maps its type nor has a default
 */
export class UnhandledEventError extends SwitchyardError {
  constructor(public eventType: string) {
    super(`No mapping and no default for event "${eventType}"`);
    this.name = 'UnhandledEventError';
  }
}
