/**
 * SIE 透镜测试
 */

import { describe, it, expect } from 'vitest';
import { Vector2 } from '@galacean/engine-math';
import { SIELens } from '../src/SIELens';

describe('SIELens', () => {
  it('deflects radially by b for a spherical lens', () => {
    const lens = new SIELens({ x: 0, y: 0, b: 1, q: 1, pa: 0 });
    const p = lens.deflect(new Vector2(3, 0));
    expect(p.x).toBe(2);
    expect(p.y).toBe(0);
  });

  it('ignores the position angle for a spherical lens', () => {
    const lens = new SIELens({ x: 1, y: 1, b: 1, q: 1, pa: 90 });
    const p = lens.deflect(new Vector2(1, 3));
    expect(p.x).toBeCloseTo(1, 12);
    expect(p.y).toBeCloseTo(2, 12);
  });

  it('keeps points on the major axis on that axis', () => {
    const lens = new SIELens({ x: 0, y: 0, b: 1, q: 0.6, pa: 0 });
    const p = lens.deflect(new Vector2(3, 0));
    // √(1 − q²) = 0.8, r = q·x = 1.8
    expect(p.x).toBeCloseTo(3 - (Math.sqrt(0.6) / 0.8) * Math.atan(2.4 / 1.8), 12);
    expect(p.y).toBe(0);
  });

  it('approaches the spherical limit as q tends to 1', () => {
    const point = new Vector2(2, 1);
    const ellipse = new SIELens({ x: 0.5, y: -0.5, b: 2, q: 0.999999, pa: 30 }).deflect(point);
    const sphere = new SIELens({ x: 0.5, y: -0.5, b: 2, q: 1, pa: 30 }).deflect(point);
    expect(ellipse.x).toBeCloseTo(sphere.x, 3);
    expect(ellipse.y).toBeCloseTo(sphere.y, 3);
  });

  it('is antisymmetric about the lens center', () => {
    const lens = new SIELens({ x: 11.23, y: 9.87, b: 6.34, q: 0.78, pa: 34.56 });
    const a = lens.deflect(new Vector2(11.23 + 2.5, 9.87 - 1.25));
    const b = lens.deflect(new Vector2(11.23 - 2.5, 9.87 + 1.25));
    expect(a.x - 11.23).toBeCloseTo(-(b.x - 11.23), 10);
    expect(a.y - 9.87).toBeCloseTo(-(b.y - 9.87), 10);
  });

  it('pulls points towards the lens center', () => {
    const lens = new SIELens({ x: 11.23, y: 9.87, b: 6.34, q: 0.78, pa: 34.56 });
    const image = new Vector2(20, 18);
    const source = lens.deflect(image);
    const center = new Vector2(11.23, 9.87);
    expect(Vector2.distance(source, center)).toBeLessThan(Vector2.distance(image, center));
  });

  it('returns a non-finite point at the lens center', () => {
    const lens = new SIELens({ x: 2, y: 3, b: 1, q: 0.5, pa: 10 });
    const p = lens.deflect(new Vector2(2, 3));
    expect(Number.isFinite(p.x)).toBe(false);
  });

  it('writes into the output vector and allows aliasing', () => {
    const lens = new SIELens({ x: 0, y: 0, b: 1, q: 1, pa: 0 });
    const point = new Vector2(0, -4);
    expect(lens.deflect(point, point)).toBe(point);
    expect(point.x).toBe(0);
    expect(point.y).toBe(-3);
  });

  it('copies its parameters', () => {
    const params = { x: 0, y: 0, b: 1, q: 1, pa: 0 };
    const lens = new SIELens(params);
    params.b = 5;
    expect(lens.params.b).toBe(1);
  });
});
