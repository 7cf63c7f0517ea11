import { describe, it, expect } from 'vitest';
import { LeaseState, LeaseStateVO } from '../../../src/domain/value-objects/lease-state.vo';

describe('LeaseStateVO', () => {
  it('should start unheld', () => {
    const state = LeaseStateVO.unheld();

    expect(state.value).toBe(LeaseState.UNHELD);
    expect(state.isUnheld()).toBe(true);
    expect(state.isHeld()).toBe(false);
  });

  it('should walk the full acquire and release cycle', () => {
    const held = LeaseStateVO.unheld()
      .transitionTo(LeaseState.ACQUIRING)
      .transitionTo(LeaseState.HELD);

    expect(held.isHeld()).toBe(true);

    const released = held.transitionTo(LeaseState.RELEASING).transitionTo(LeaseState.UNHELD);
    expect(released.isUnheld()).toBe(true);
  });

  it('should allow a failed acquisition to fall back to UNHELD', () => {
    const acquiring = LeaseStateVO.unheld().transitionTo(LeaseState.ACQUIRING);

    expect(acquiring.transitionTo(LeaseState.UNHELD).value).toBe(LeaseState.UNHELD);
  });

  it('should reject skipping straight to HELD', () => {
    expect(() => LeaseStateVO.unheld().transitionTo(LeaseState.HELD)).toThrow(
      'Invalid lease transition: UNHELD → HELD',
    );
  });

  it('should reject releasing without passing through RELEASING', () => {
    const held = LeaseStateVO.unheld().transitionTo(LeaseState.ACQUIRING).transitionTo(LeaseState.HELD);

    expect(held.canTransitionTo(LeaseState.UNHELD)).toBe(false);
  });

  it('should be immutable', () => {
    const unheld = LeaseStateVO.unheld();
    const acquiring = unheld.transitionTo(LeaseState.ACQUIRING);

    expect(unheld.value).toBe(LeaseState.UNHELD);
    expect(acquiring.equals(unheld)).toBe(false);
    expect(acquiring.toString()).toBe('ACQUIRING');
  });
});
