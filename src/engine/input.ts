/**
 * Keyboard state for frame-based games
 *
 * InputSnapshot holds the raw "is this key down" flags written by whatever
 * delivers key events (stdin adapter, websocket, tests). InputStateMachine
 * turns those flags into per-frame edges: it is sampled once per frame, so
 * every query within a frame sees the same answer.
 */

// ============================================================================
// Logical keys
// ============================================================================

export const LOGICAL_KEYS = [
  'up', 'down', 'left', 'right',
  'w', 'a', 's', 'd',
  'space', // fire
  'q',     // action
] as const;

export type LogicalKey = typeof LOGICAL_KEYS[number];

export type InputSample = Readonly<Record<LogicalKey, boolean>>;

export function isLogicalKey(value: string): value is LogicalKey {
  return LOGICAL_KEYS.some(key => key === value);
}

/** Frames between auto-repeated fire() signals while a key is held */
export const DEFAULT_FIRE_COOLDOWN = 10;

function releasedSample(): Record<LogicalKey, boolean> {
  return {
    up: false, down: false, left: false, right: false,
    w: false, a: false, s: false, d: false,
    space: false, q: false,
  };
}

// ============================================================================
// Snapshot
// ============================================================================

/**
 * Raw key flags. One writer (the input source), read once per frame.
 */
export class InputSnapshot {
  private readonly pressed = releasedSample();

  press(key: LogicalKey): void {
    this.pressed[key] = true;
  }

  release(key: LogicalKey): void {
    this.pressed[key] = false;
  }

  set(key: LogicalKey, pressed: boolean): void {
    this.pressed[key] = pressed;
  }

  releaseAll(): void {
    for (const key of LOGICAL_KEYS) this.pressed[key] = false;
  }

  isPressed(key: LogicalKey): boolean {
    return this.pressed[key];
  }

  /**
   * Frozen copy of the current flags, taken at the start of a frame
   */
  capture(): InputSample {
    return Object.freeze({ ...this.pressed });
  }
}

// ============================================================================
// State machine
// ============================================================================

export class InputStateMachine {
  readonly key: LogicalKey;
  private readonly snapshot: InputSnapshot;
  private previous = false;
  private current = false;
  private cooldownRemaining = 0;
  private fireCooldownLength: number;

  constructor(key: LogicalKey, snapshot: InputSnapshot, fireCooldown: number = DEFAULT_FIRE_COOLDOWN) {
    this.key = key;
    this.snapshot = snapshot;
    this.fireCooldownLength = checkCooldown(fireCooldown);
  }

  /**
   * Advance one frame. Call exactly once per frame, before reading signals.
   * Without a sample the snapshot's live flag is read.
   */
  update(sample?: InputSample): void {
    this.previous = this.current;
    this.current = sample ? sample[this.key] : this.snapshot.isPressed(this.key);
    if (this.cooldownRemaining > 0) {
      this.cooldownRemaining--;
    }
  }

  /** Key is down this frame */
  get pressed(): boolean {
    return this.current;
  }

  get justPressed(): boolean {
    return this.current && !this.previous;
  }

  get stillPressed(): boolean {
    return this.current && this.previous;
  }

  get justNotPressed(): boolean {
    return !this.current && this.previous;
  }

  get stillNotPressed(): boolean {
    return !this.current && !this.previous;
  }

  get cooldown(): number {
    return this.cooldownRemaining;
  }

  get fireCooldown(): number {
    return this.fireCooldownLength;
  }

  /**
   * True on the press frame, then every `fireCooldown` frames while held.
   * A true result restarts the cooldown.
   */
  fire(): boolean {
    if (this.justPressed || (this.stillPressed && this.cooldownRemaining === 0)) {
      this.cooldownRemaining = this.fireCooldownLength;
      return true;
    }
    return false;
  }

  /**
   * 0 fires on every held frame
   */
  setFireCooldown(frames: number): void {
    this.fireCooldownLength = checkCooldown(frames);
  }
}

function checkCooldown(frames: number): number {
  if (!Number.isInteger(frames) || frames < 0) {
    throw new RangeError(`Fire cooldown must be a non-negative integer, got ${frames}`);
  }
  return frames;
}

// ============================================================================
// Controls
// ============================================================================

/**
 * One state machine per logical key, all reading the same snapshot
 */
export class Controls {
  readonly snapshot: InputSnapshot;
  private readonly machines: ReadonlyMap<LogicalKey, InputStateMachine>;

  constructor(snapshot: InputSnapshot = new InputSnapshot(), fireCooldown: number = DEFAULT_FIRE_COOLDOWN) {
    this.snapshot = snapshot;
    this.machines = new Map(
      LOGICAL_KEYS.map(key => [key, new InputStateMachine(key, snapshot, fireCooldown)] as const)
    );
  }

  key(key: LogicalKey): InputStateMachine {
    const machine = this.machines.get(key);
    if (!machine) {
      throw new RangeError(`Unknown key: ${String(key)}`);
    }
    return machine;
  }

  /**
   * Sample the snapshot once and feed that sample to every machine
   */
  update(): InputSample {
    const sample = this.snapshot.capture();
    for (const machine of this.machines.values()) {
      machine.update(sample);
    }
    return sample;
  }

  get up(): InputStateMachine { return this.key('up'); }
  get down(): InputStateMachine { return this.key('down'); }
  get left(): InputStateMachine { return this.key('left'); }
  get right(): InputStateMachine { return this.key('right'); }
  get w(): InputStateMachine { return this.key('w'); }
  get a(): InputStateMachine { return this.key('a'); }
  get s(): InputStateMachine { return this.key('s'); }
  get d(): InputStateMachine { return this.key('d'); }
  get space(): InputStateMachine { return this.key('space'); }
  get q(): InputStateMachine { return this.key('q'); }
}
