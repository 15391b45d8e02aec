/**
 * Spatial helpers for workcell coordinates (millimetres).
 */

import type { Position } from '../../types';

export function createPosition(x: number, y: number, z: number, name?: string): Position {
  return Object.freeze(name === undefined ? { x, y, z } : { x, y, z, name });
}

/**
 * Straight-line distance between two points. Used only to estimate travel time.
 */
export function distanceTo(from: Position, to: Position): number {
  return Math.sqrt(
    Math.pow(to.x - from.x, 2) +
    Math.pow(to.y - from.y, 2) +
    Math.pow(to.z - from.z, 2)
  );
}

/** Coordinate equality; the display name is not compared */
export function samePosition(a: Position, b: Position): boolean {
  return a.x === b.x && a.y === b.y && a.z === b.z;
}

export function formatPosition(p: Position): string {
  const coords = `(${p.x}, ${p.y}, ${p.z})`;
  return p.name ? `${p.name} ${coords}` : coords;
}
