import type { XrFacadeState } from "../contracts/xr";

const TRANSITIONS: Record<XrFacadeState, readonly XrFacadeState[]> = {
  uninitialized: ["idle"],
  idle: ["requested"],
  requested: ["active", "idle"],
  active: ["blurred", "ended"],
  blurred: ["active", "ended"],
  ended: ["requested"]
};

export class InvalidStateTransitionError extends Error {
  readonly from: XrFacadeState;
  readonly to: XrFacadeState;

  constructor(from: XrFacadeState, to: XrFacadeState) {
    super(`Invalid XR facade state transition: ${from} -> ${to}`);
    this.name = "InvalidStateTransitionError";
    this.from = from;
    this.to = to;
  }
}

export function canTransition(from: XrFacadeState, to: XrFacadeState): boolean {
  return TRANSITIONS[from].includes(to);
}

export class SessionStateMachine {
  private current: XrFacadeState = "uninitialized";

  get state(): XrFacadeState {
    return this.current;
  }

  is(...states: XrFacadeState[]): boolean {
    return states.includes(this.current);
  }

  transition(next: XrFacadeState): XrFacadeState {
    if (!canTransition(this.current, next)) {
      throw new InvalidStateTransitionError(this.current, next);
    }
    const previous = this.current;
    this.current = next;
    return previous;
  }
}
