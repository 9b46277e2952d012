import { describe, it, expect } from 'vitest';
import { Vector2 } from 'three';
import { clamp01, clampToBounds, followWeight, snapScalar, snapToPixelGrid } from './pixelGrid';

describe('pixelGrid', () => {
  it('clamps weights into [0, 1]', () => {
    expect(clamp01(-0.5)).toBe(0);
    expect(clamp01(0.25)).toBe(0.25);
    expect(clamp01(3)).toBe(1);
  });

  it('scales the follow weight by elapsed time', () => {
    expect(followWeight(4, 0.125)).toBe(0.5);
    expect(followWeight(10, 0.5)).toBe(1);
    expect(followWeight(10, -0.1)).toBe(0);
  });

  it('rounds to the nearest pixel', () => {
    expect(snapScalar(10.3, 1)).toBe(10);
    expect(snapScalar(5.7, 1)).toBe(6);
    expect(snapScalar(7, 2)).toBe(8);
    expect(snapScalar(6.9, 2)).toBe(6);
    expect(snapScalar(0.3, 0.5)).toBe(0.5);
  });

  it('never returns negative zero', () => {
    expect(Object.is(snapScalar(-0.2, 1), 0)).toBe(true);
  });

  it('snaps both axes into the output vector', () => {
    const out = new Vector2();
    const result = snapToPixelGrid({ x: 17.9, y: -9.1 }, 4, out);

    expect(result).toBe(out);
    expect(out.x).toBe(16);
    expect(out.y).toBe(-8);
  });

  it('clamps each axis on its own', () => {
    const position = new Vector2(-20, 75);

    clampToBounds(position, { left: 0, right: 320, top: 0, bottom: 180 });

    expect(position.x).toBe(0);
    expect(position.y).toBe(75);
  });
});
