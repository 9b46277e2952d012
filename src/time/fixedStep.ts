/**
 * @file fixedStep.ts
 * Runs a simulation callback at a fixed timestep, accumulating the variable
 * render-frame deltas the host hands it.
 */
import { FIXED_HZ, MAX_FRAME_DELTA_S } from '../shared/constants';

export interface FixedStepOptions {
  hz?: number;
  // Largest frame delta accepted in one call; more than this is dropped.
  maxFrameDelta?: number;
}

export interface FixedStepper {
  readonly fixedDt: number;
  /**
   * Runs `simulationCallback(fixedDt)` once per whole step accumulated.
   * @param frameDeltaSeconds Time since the previous render frame.
   * @returns The number of steps run.
   */
  advance: (frameDeltaSeconds: number, simulationCallback: (fixedDt: number) => void) => number;
  // Leftover fraction of a step, for render interpolation
  getAlpha: () => number;
  reset: () => void;
}

export function createFixedStep(options: FixedStepOptions = {}): FixedStepper {
  const hz = options.hz ?? FIXED_HZ;
  const maxFrameDelta = options.maxFrameDelta ?? MAX_FRAME_DELTA_S;
  if (!(hz > 0) || !(maxFrameDelta > 0)) {
    throw new Error(`[FixedStep] hz and maxFrameDelta must be > 0 (got ${hz}, ${maxFrameDelta})`);
  }
  const fixedDt = 1 / hz;

  let accumulator = 0;

  const advance = (frameDeltaSeconds: number, simulationCallback: (fixedDt: number) => void): number => {
    let frameDelta = Math.max(0, frameDeltaSeconds);

    // Cap hitches to avoid a spiral of death
    if (frameDelta > maxFrameDelta) {
      console.warn(`[FixedStep] Large frameDeltaSeconds detected: ${frameDelta.toFixed(3)}s. Capping to ${maxFrameDelta}s.`);
      frameDelta = maxFrameDelta;
    }
    accumulator += frameDelta;

    let steps = 0;
    // Relative tolerance keeps 0.25s at 60Hz from landing at 14.999... steps
    // and still terminates for tiny fixedDt.
    while (accumulator >= fixedDt * (1 - 1e-9)) {
      simulationCallback(fixedDt);
      accumulator = Math.max(0, accumulator - fixedDt);
      steps++;
    }
    return steps;
  };

  return {
    fixedDt,
    advance,
    getAlpha: () => accumulator / fixedDt,
    reset: () => {
      accumulator = 0;
    },
  };
}
