/**
 * Lease State Value Object
 * In-process view of a lease: UNHELD → ACQUIRING → HELD → RELEASING → UNHELD.
 * ACQUIRING only exists inside a single tryAcquire() call.
 */
export enum LeaseState {
  UNHELD = 'UNHELD',
  ACQUIRING = 'ACQUIRING',
  HELD = 'HELD',
  RELEASING = 'RELEASING',
}

const TRANSITIONS: Record<LeaseState, readonly LeaseState[]> = {
  [LeaseState.UNHELD]: [LeaseState.ACQUIRING],
  [LeaseState.ACQUIRING]: [LeaseState.HELD, LeaseState.UNHELD],
  [LeaseState.HELD]: [LeaseState.RELEASING],
  [LeaseState.RELEASING]: [LeaseState.UNHELD],
};

export class LeaseStateVO {
  private constructor(private readonly _value: LeaseState) {}

  static unheld(): LeaseStateVO {
    return new LeaseStateVO(LeaseState.UNHELD);
  }

  get value(): LeaseState {
    return this._value;
  }

  isHeld(): boolean {
    return this._value === LeaseState.HELD;
  }

  isUnheld(): boolean {
    return this._value === LeaseState.UNHELD;
  }

  canTransitionTo(next: LeaseState): boolean {
    return TRANSITIONS[this._value].includes(next);
  }

  transitionTo(next: LeaseState): LeaseStateVO {
    if (!this.canTransitionTo(next)) {
      throw new Error(`Invalid lease transition: ${this._value} → ${next}`);
    }
    return new LeaseStateVO(next);
  }

  equals(other: LeaseStateVO): boolean {
    return this._value === other._value;
  }

  toString(): string {
    return this._value;
  }
}
