/**
 * StateMachine - Lightweight finite state machine
 *
 * Transitions are declared per event and validated on every call, so an
 * event fired from the wrong state fails loudly instead of silently moving on.
 */

/**
 * Transition configuration for a single event
 */
export interface TransitionConfig<S extends string> {
  /** State(s) from which this transition is allowed */
  from: S | readonly S[];
  /** Target state after transition */
  to: S;
}

/**
 * Full state machine configuration
 */
export interface StateMachineConfig<S extends string, E extends string> {
  initial: S;
  /** Transition definitions keyed by event */
  transitions: Record<E, TransitionConfig<S>>;
  /** Callback fired on successful transition */
  onTransition?: (from: S, to: S, event: E) => void;
}

/**
 * Error thrown when an invalid state transition is attempted
 */
export class InvalidTransitionError extends Error {
  constructor(
    public readonly currentState: string,
    public readonly event: string,
    public readonly allowedFromStates: readonly string[]
  ) {
    super(
      `Invalid transition: Cannot apply '${event}' from state '${currentState}'. ` +
        `Allowed from: [${allowedFromStates.join(', ')}]`
    );
    this.name = 'InvalidTransitionError';
    Error.captureStackTrace?.(this, this.constructor);
  }
}

function allowedFrom<S extends string>(transition: TransitionConfig<S>): readonly S[] {
  const { from } = transition;
  return typeof from === 'string' ? [from] : from;
}

/**
 * Finite state machine with typed states and events
 *
 * @example
 * ```typescript
 * const machine = new StateMachine({
 *   initial: 'idle',
 *   transitions: {
 *     build: { from: 'idle', to: 'build' },
 *     finish: { from: ['build'], to: 'idle' },
 *   },
 * });
 *
 * machine.transition('build'); // idle -> build
 * machine.canTransition('build'); // false
 * ```
 */
export class StateMachine<S extends string, E extends string> {
  private _state: S;
  private readonly _history: S[];

  constructor(private readonly config: StateMachineConfig<S, E>) {
    this._state = config.initial;
    this._history = [config.initial];
  }

  get state(): S {
    return this._state;
  }

  /**
   * Every state entered so far, starting with the initial state
   */
  get history(): readonly S[] {
    return this._history;
  }

  canTransition(event: E): boolean {
    return allowedFrom(this.config.transitions[event]).includes(this._state);
  }

  /**
   * Execute a state transition
   * @throws InvalidTransitionError if the event is not allowed from the current state
   */
  transition(event: E): S {
    const transition = this.config.transitions[event];
    const from = allowedFrom(transition);

    if (!from.includes(this._state)) {
      throw new InvalidTransitionError(this._state, event, from);
    }

    const previous = this._state;
    this._state = transition.to;
    this._history.push(this._state);
    this.config.onTransition?.(previous, this._state, event);

    return this._state;
  }

  isIn(state: S): boolean {
    return this._state === state;
  }
}
