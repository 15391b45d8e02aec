/**
 * Device helpers. Devices are plain readonly records; every helper returns a new copy.
 */

import type { Device, DeviceDefinition, DeviceState, Position } from '../../types';
import { StateError } from './errors';

export function createDevice(name: string, position: Position, purpose = ''): Device {
  return {
    name,
    position,
    purpose,
    occupied: false,
    plateId: null,
    state: 'IDLE',
  };
}

export function deviceFromDefinition(def: DeviceDefinition): Device {
  return createDevice(def.name, def.position, def.purpose);
}

/**
 * @throws StateError if the device already holds a plate
 */
export function markOccupied(device: Device, plateId: string): Device {
  if (device.occupied) {
    throw new StateError(`${device.name} is already occupied by ${device.plateId}`, {
      device: device.name,
      plateId,
      foundPlateId: device.plateId,
    });
  }
  return { ...device, occupied: true, plateId };
}

/**
 * @throws StateError if the device is already free
 */
export function markFree(device: Device): Device {
  if (!device.occupied) {
    throw new StateError(`${device.name} is already free`, { device: device.name });
  }
  return { ...device, occupied: false, plateId: null };
}

// Informational only: device state never gates an operation
export function setDeviceState(device: Device, state: DeviceState): Device {
  return device.state === state ? device : { ...device, state };
}
