/**
 * Workcell State Aggregate
 *
 * Builds the explicit state every transition receives, plus read-only lookups.
 */

import type { Device, DeviceDefinition, Plate, Position, WorkcellState } from '../../types';
import { deviceFromDefinition } from './device';
import { UnknownDeviceError } from './errors';

export interface WorkcellStateOptions {
  name: string;
  devices: readonly DeviceDefinition[];
  /** Where the robot starts and returns to */
  home: Position;
}

export function createWorkcellState(options: WorkcellStateOptions): WorkcellState {
  const devices: Record<string, Device> = Object.fromEntries(
    options.devices.map(def => [def.name, deviceFromDefinition(def)])
  );

  return {
    name: options.name,
    devices,
    plates: {},
    robot: {
      currentPosition: options.home,
      grippedPlateId: null,
      movesCount: 0,
      distanceTravelledMm: 0,
    },
    elapsedMs: 0,
  };
}

/**
 * @throws UnknownDeviceError if the name is not in the roster
 */
export function getDevice(state: WorkcellState, name: string): Device {
  if (!hasDevice(state, name)) {
    throw new UnknownDeviceError(name);
  }
  return state.devices[name];
}

export function hasDevice(state: WorkcellState, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(state.devices, name);
}

export function getPlate(state: WorkcellState, plateId: string): Plate | undefined {
  // Own keys only: ids like "toString" must not resolve to Object.prototype members
  return Object.prototype.hasOwnProperty.call(state.plates, plateId)
    ? state.plates[plateId]
    : undefined;
}

export function listDevices(state: WorkcellState): Device[] {
  return Object.values(state.devices);
}
