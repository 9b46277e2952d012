import { describe, it, expect, vi, afterEach } from 'vitest';
import { createFixedStep } from '../../src/time/fixedStep';

describe('createFixedStep', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('runs one step per 60Hz frame', () => {
    const stepper = createFixedStep();
    const callback = vi.fn();

    for (let i = 0; i < 10; i++) {
      stepper.advance(1 / 60, callback);
    }

    expect(callback).toHaveBeenCalledTimes(10);
    expect(callback).toHaveBeenCalledWith(1 / 60);
  });

  it('accumulates short frames until a whole step is due', () => {
    const stepper = createFixedStep({ hz: 50 });
    const callback = vi.fn();

    expect(stepper.advance(0.01, callback)).toBe(0);
    expect(stepper.getAlpha()).toBeCloseTo(0.5, 10);
    expect(stepper.advance(0.01, callback)).toBe(1);
    expect(callback).toHaveBeenCalledWith(0.02);
  });

  it('caps a hitching frame', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const stepper = createFixedStep({ hz: 60, maxFrameDelta: 0.25 });
    const callback = vi.fn();

    const steps = stepper.advance(1.0, callback);

    expect(steps).toBe(15);
    expect(callback).toHaveBeenCalledTimes(15);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('ignores negative deltas', () => {
    const stepper = createFixedStep();
    const callback = vi.fn();

    expect(stepper.advance(-1, callback)).toBe(0);
    expect(stepper.getAlpha()).toBe(0);
  });

  it('drops the leftover on reset', () => {
    const stepper = createFixedStep({ hz: 10 });
    const callback = vi.fn();

    stepper.advance(0.05, callback);
    stepper.reset();

    expect(stepper.getAlpha()).toBe(0);
    expect(stepper.advance(0.05, callback)).toBe(0);
    expect(callback).not.toHaveBeenCalled();
  });

  it('returns on an empty frame even at a very high rate', () => {
    const stepper = createFixedStep({ hz: 2e9 });
    const callback = vi.fn();

    expect(stepper.advance(0, callback)).toBe(0);
    expect(callback).not.toHaveBeenCalled();
  });

  it('rejects a non-positive rate', () => {
    expect(() => createFixedStep({ hz: 0 })).toThrow('[FixedStep] hz and maxFrameDelta must be > 0 (got 0, 0.25)');
  });
});
