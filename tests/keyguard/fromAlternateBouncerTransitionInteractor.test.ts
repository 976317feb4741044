import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { KeyguardSignalValues } from '../../src/keyguard/signals';
import { createKeyguardTransitionCore } from '../../src/keyguard/transitionCoordinator';
import { FAST_CONFIG, describeStep, quietLog, recordSteps, started } from './helpers';

function alternateBouncerCore(initialSignals: Partial<KeyguardSignalValues>) {
  const core = createKeyguardTransitionCore({
    config: FAST_CONFIG,
    initialState: 'ALTERNATE_BOUNCER',
    initialSignals,
    log: quietLog(),
  });
  const steps = recordSteps(core.repository);
  const interactor = core.coordinator.interactor('ALTERNATE_BOUNCER');
  return { ...core, steps, interactor };
}

describe('FromALTERNATE_BOUNCER interactor', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('stays put on a biometric success when nothing is occluding', () => {
    const { signals, steps, repository, interactor } = alternateBouncerCore({
      alternateBouncerVisible: true,
      occluded: false,
    });
    expect(interactor.status).toBe('ACTIVE');

    signals.biometricAuthenticated.set(true);
    signals.biometricAuthenticated.set(null);
    vi.advanceTimersByTime(1000);

    expect(steps).toEqual([]);
    expect(repository.currentState()).toBe('ALTERNATE_BOUNCER');
  });

  it('goes to GONE exactly once on a biometric success over an occluding app', () => {
    const { signals, steps, repository, interactor } = alternateBouncerCore({
      alternateBouncerVisible: true,
      occluded: true,
    });

    signals.biometricAuthenticated.set(true);
    signals.biometricAuthenticated.set(null);
    vi.advanceTimersByTime(100);

    expect(steps.map(describeStep)).toEqual([
      'ALTERNATE_BOUNCER->GONE STARTED 0',
      'ALTERNATE_BOUNCER->GONE RUNNING 0.25',
      'ALTERNATE_BOUNCER->GONE RUNNING 0.5',
      'ALTERNATE_BOUNCER->GONE RUNNING 0.75',
      'ALTERNATE_BOUNCER->GONE RUNNING 1',
      'ALTERNATE_BOUNCER->GONE FINISHED 1',
    ]);
    expect(steps[0].ownerName).toBe('FromALTERNATE_BOUNCERTransitionInteractor');

    vi.advanceTimersByTime(1000);
    expect(started(steps)).toEqual(['ALTERNATE_BOUNCER->GONE']);
    expect(repository.currentState()).toBe('GONE');
    expect(interactor.status).toBe('DORMANT');
  });

  it('returns to OCCLUDED only after the hide has held for the guard delay', () => {
    const { signals, steps, repository, interactor } = alternateBouncerCore({
      alternateBouncerVisible: true,
      occluded: true,
    });

    signals.alternateBouncerVisible.set(false);
    expect(interactor.pendingGuard).toBe('OCCLUDED:alternate bouncer hidden over app');

    vi.advanceTimersByTime(199);
    expect(steps).toEqual([]);

    vi.advanceTimersByTime(1);
    expect(started(steps)).toEqual(['ALTERNATE_BOUNCER->OCCLUDED']);
    expect(interactor.pendingGuard).toBeNull();

    vi.advanceTimersByTime(100);
    expect(steps.map(describeStep).at(-1)).toBe('ALTERNATE_BOUNCER->OCCLUDED FINISHED 1');
    expect(repository.currentState()).toBe('OCCLUDED');
    expect(repository.log.entries().filter((e) => e.kind === 'guard').map((e) => e.message)).toEqual([
      'FromALTERNATE_BOUNCERTransitionInteractor held ALTERNATE_BOUNCER→OCCLUDED for 200ms',
    ]);
  });

  it('drops the guarded return when the bouncer shows again in time', () => {
    const { signals, steps, repository, interactor } = alternateBouncerCore({
      alternateBouncerVisible: true,
      occluded: true,
    });

    signals.alternateBouncerVisible.set(false);
    vi.advanceTimersByTime(100);
    signals.alternateBouncerVisible.set(true);
    expect(interactor.pendingGuard).toBeNull();

    vi.advanceTimersByTime(1000);
    expect(steps).toEqual([]);
    expect(repository.currentState()).toBe('ALTERNATE_BOUNCER');
  });

  it('keeps the guard deadline when an unrelated signal re-evaluates the same decision', () => {
    const { signals, steps } = alternateBouncerCore({ alternateBouncerVisible: true, occluded: true });

    signals.alternateBouncerVisible.set(false);
    vi.advanceTimersByTime(150);
    signals.biometricAuthenticated.set(false);
    vi.advanceTimersByTime(50);

    expect(started(steps)).toEqual(['ALTERNATE_BOUNCER->OCCLUDED']);
  });

  it('restarts the guard when the decision changes target', () => {
    const { signals, steps } = alternateBouncerCore({ alternateBouncerVisible: true, occluded: true });

    signals.alternateBouncerVisible.set(false);
    vi.advanceTimersByTime(150);
    signals.occluded.set(false);
    vi.advanceTimersByTime(150);
    expect(steps).toEqual([]);

    vi.advanceTimersByTime(50);
    expect(started(steps)).toEqual(['ALTERNATE_BOUNCER->LOCKED']);
  });

  it('cancels the pending guard when an immediate transition wins', () => {
    const { signals, steps, repository } = alternateBouncerCore({ alternateBouncerVisible: true, occluded: true });

    signals.alternateBouncerVisible.set(false);
    vi.advanceTimersByTime(100);
    signals.keyguardGoingAway.set(true);
    vi.advanceTimersByTime(1000);

    expect(started(steps)).toEqual(['ALTERNATE_BOUNCER->GONE']);
    expect(repository.currentState()).toBe('GONE');
  });

  it('does nothing when nudged while dormant', () => {
    const { coordinator, steps } = alternateBouncerCore({ alternateBouncerVisible: true });
    const locked = coordinator.interactor('LOCKED');
    expect(locked.status).toBe('DORMANT');
    locked.onSignal();
    expect(steps).toEqual([]);
  });
});
