/**
 * Workcell Test Helpers
 */

import type { WorkcellState } from '../../types';
import { DEVICE_ROSTER, HOME_POSITION } from '../../config/workcell';
import { createWorkcellState } from '../../lib/workcell/state';
import { loadPlate } from '../../lib/workcell/robotArm';

/** Fresh roster state with plates seeded as `{ device: plateId }` */
export function stateWithPlates(seed: Record<string, string> = {}): WorkcellState {
  let state = createWorkcellState({ name: 'Test Cell', devices: DEVICE_ROSTER, home: HOME_POSITION });
  for (const [device, plateId] of Object.entries(seed)) {
    const result = loadPlate(state, device, plateId);
    if (!result.ok) throw result.error;
    state = result.state;
  }
  return state;
}

/** Unwrap a successful transition, failing the test otherwise */
export function expectOk<T extends { ok: boolean }>(result: T): Extract<T, { ok: true }> {
  if (!isOk(result)) {
    throw new Error('Expected transition to succeed');
  }
  return result;
}

function isOk<T extends { ok: boolean }>(result: T): result is Extract<T, { ok: true }> {
  return result.ok;
}

export const fixedClock = (iso = '2026-01-05T09:30:00') => () => new Date(iso);
