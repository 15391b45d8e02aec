/**
 * Consistency checks over a workcell snapshot.
 *
 * Returns one message per violation; an empty list means the snapshot is consistent.
 */

import type { WorkcellState } from '../../types';
import { isAtDevice } from './plate';
import { getPlate, hasDevice } from './state';

export function checkInvariants(state: WorkcellState): string[] {
  const violations: string[] = [];
  const { devices, plates, robot } = state;

  // Occupancy flag <-> plate location
  for (const device of Object.values(devices)) {
    const located = Object.values(plates).filter(p => isAtDevice(p, device.name));

    if (device.occupied) {
      if (device.plateId === null) {
        violations.push(`${device.name} is occupied but names no plate`);
      } else if (located.length !== 1 || located[0].id !== device.plateId) {
        violations.push(`${device.name} holds ${device.plateId} but that plate is located elsewhere`);
      }
    } else {
      if (device.plateId !== null) {
        violations.push(`${device.name} is free but still names plate ${device.plateId}`);
      }
      if (located.length > 0) {
        violations.push(`${device.name} is free but plate ${located[0].id} is located there`);
      }
    }
  }

  if (robot.grippedPlateId !== null) {
    const held = getPlate(state, robot.grippedPlateId);
    if (!held || held.location.kind !== 'IN_GRIPPER') {
      violations.push(`gripper holds ${robot.grippedPlateId} but that plate is not IN_GRIPPER`);
    }
  }

  // At most one holder per plate
  for (const plate of Object.values(plates)) {
    const holders = Object.values(devices).filter(d => d.plateId === plate.id).length
      + (robot.grippedPlateId === plate.id ? 1 : 0);

    if (holders > 1) {
      violations.push(`plate ${plate.id} is held in ${holders} places`);
    }
    if (plate.location.kind === 'IN_GRIPPER' && robot.grippedPlateId !== plate.id) {
      violations.push(`plate ${plate.id} is IN_GRIPPER but the gripper holds ${robot.grippedPlateId ?? 'nothing'}`);
    }
    if (plate.location.kind === 'DEVICE' && !hasDevice(state, plate.location.device)) {
      violations.push(`plate ${plate.id} is located at unknown device ${plate.location.device}`);
    }
  }

  return violations;
}
