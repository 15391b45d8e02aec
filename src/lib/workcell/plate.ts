import type { Plate, PlateLocation } from '../../types';

export const NO_LOCATION: PlateLocation = { kind: 'NONE' };
export const IN_GRIPPER: PlateLocation = { kind: 'IN_GRIPPER' };

export function atDevice(device: string): PlateLocation {
  return { kind: 'DEVICE', device };
}

export function createPlate(id: string, location: PlateLocation = NO_LOCATION): Plate {
  return { id, location };
}

// No validation here; callers check legality first
export function relocate(plate: Plate, location: PlateLocation): Plate {
  return { ...plate, location };
}

export function isAtDevice(plate: Plate, device: string): boolean {
  return plate.location.kind === 'DEVICE' && plate.location.device === device;
}

export function describeLocation(location: PlateLocation): string {
  switch (location.kind) {
    case 'DEVICE':
      return location.device;
    case 'IN_GRIPPER':
      return 'IN_GRIPPER';
    case 'NONE':
      return 'NONE';
  }
}
