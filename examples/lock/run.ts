/**
 * Door lock example: lock with a key, try a wrong key, then the right one
 */

import {
  EntryMethod,
  HandleMethod,
  Maybe,
  State,
  TransitionTo,
  Switchyard,
  createHandlers,
  defineMachine,
  nothing,
  transitionTo,
  type PickEvent,
} from '../../src';

type DoorEvent =
  | { type: 'open' }
  | { type: 'close' }
  | { type: 'lock'; newKey: number }
  | { type: 'unlock'; key: number };

const door = createHandlers<DoorEvent>();

class Closed {
  readonly handle = door.will(
    door.byDefault(nothing),
    door.on('lock', () => transitionTo(Locked)),
    door.on('open', () => transitionTo(Opened))
  );
}

class Opened {
  readonly handle = door.will(door.byDefault(nothing), door.on('close', () => transitionTo(Closed)));
}

class Locked extends State<DoorEvent> {
  constructor(private key: number) {
    super();
  }

  clone(): Locked {
    return new Locked(this.key);
  }

  @EntryMethod('lock')
  rekey(event: PickEvent<DoorEvent, 'lock'>): void {
    this.key = event.newKey;
  }

  @HandleMethod('unlock')
  unlock(event: PickEvent<DoorEvent, 'unlock'>): Maybe<TransitionTo<Closed>> {
    return Maybe.when(event.key === this.key, transitionTo(Closed));
  }
}

const Door = defineMachine<DoorEvent>()(Closed, Opened, Locked);

export function run(): string[] {
  const visited: string[] = [];
  new Switchyard({
    lifecycleHooks: {
      onTransition: (_machineId, from, to) => {
        visited.push(`${from} -> ${to}`);
      },
    },
  }).setActive();

  try {
    const machine = Door.create(new Closed(), new Opened(), new Locked(0));
    const events: DoorEvent[] = [
      { type: 'lock', newKey: 1234 },
      { type: 'unlock', key: 2 },
      { type: 'unlock', key: 1234 },
      { type: 'open' },
    ];

    for (const event of events) {
      machine.handle(event);
      console.log(`${event.type}: now ${machine.currentName}`);
    }
  } finally {
    Switchyard.clearActive();
  }

  return visited;
}

if (require.main === module) {
  try {
    console.log(run().join('\n'));
  } catch (error) {
    console.error('Lock example failed:', error);
    process.exit(1);
  }
}
