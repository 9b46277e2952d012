import * as THREE from 'three';
import type { Bounds, Vec2 } from '../shared/types';

/**
 * Clamps an interpolation weight into [0, 1] so a long frame can't overshoot.
 */
export function clamp01(t: number): number {
  return THREE.MathUtils.clamp(t, 0, 1);
}

/**
 * Weight for one frame of time-scaled smoothing.
 * Negative or zero deltas produce 0 (no movement).
 */
export function followWeight(followSpeed: number, deltaTime: number): number {
  return clamp01(followSpeed * deltaTime);
}

/**
 * Clamps each axis of `position` into the box, in place.
 */
export function clampToBounds(position: THREE.Vector2, bounds: Bounds): THREE.Vector2 {
  position.x = THREE.MathUtils.clamp(position.x, bounds.left, bounds.right);
  position.y = THREE.MathUtils.clamp(position.y, bounds.top, bounds.bottom);
  return position;
}

/**
 * Rounds a single coordinate to the nearest multiple of `pixelSize`.
 * Normalizes -0 to 0 so snapped values compare cleanly.
 */
export function snapScalar(value: number, pixelSize: number): number {
  const snapped = Math.round(value / pixelSize) * pixelSize;
  return snapped === 0 ? 0 : snapped;
}

/**
 * Quantizes a world position onto the pixel grid: world units -> pixel index
 * (rounded) -> world units. `pixelSize` must be > 0; callers validate it up front.
 */
export function snapToPixelGrid(position: Vec2, pixelSize: number, out = new THREE.Vector2()): THREE.Vector2 {
  return out.set(snapScalar(position.x, pixelSize), snapScalar(position.y, pixelSize));
}
