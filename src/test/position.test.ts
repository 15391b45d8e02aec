import { describe, it, expect } from 'vitest';
import { createPosition, distanceTo, samePosition, formatPosition } from '../lib/workcell/position';

describe('Position', () => {
  describe('createPosition', () => {
    it('should freeze the point', () => {
      const p = createPosition(1, 2, 3, 'A');
      expect(Object.isFrozen(p)).toBe(true);
      expect(p).toEqual({ x: 1, y: 2, z: 3, name: 'A' });
    });

    it('should omit the name when none is given', () => {
      expect(Object.keys(createPosition(0, 0, 0))).toEqual(['x', 'y', 'z']);
    });
  });

  describe('distanceTo', () => {
    it('should compute the euclidean distance', () => {
      expect(distanceTo(createPosition(0, 0, 0), createPosition(3, 4, 12))).toBe(13);
    });

    it('should be symmetric', () => {
      const a = createPosition(100, 200, 50);
      const b = createPosition(550, 400, 75);
      expect(distanceTo(a, b)).toBe(distanceTo(b, a));
    });

    it('should be zero only for equal coordinates', () => {
      const a = createPosition(400, 200, 100, 'LiquidHandler');
      expect(distanceTo(a, createPosition(400, 200, 100))).toBe(0);
      expect(distanceTo(a, createPosition(400, 200, 101))).toBe(1);
    });
  });

  describe('samePosition', () => {
    it('should ignore display names', () => {
      expect(samePosition(createPosition(0, 0, 0, 'Home'), createPosition(0, 0, 0))).toBe(true);
      expect(samePosition(createPosition(0, 0, 0), createPosition(0, 1, 0))).toBe(false);
    });
  });

  it('should format with and without a name', () => {
    expect(formatPosition(createPosition(100, 200, 50, 'Storage'))).toBe('Storage (100, 200, 50)');
    expect(formatPosition(createPosition(1, 2, 3))).toBe('(1, 2, 3)');
  });
});
