/**
 * Workcell Error Taxonomy
 *
 * Every rejected operation maps to one of these classes. They describe logical
 * impossibilities, not transient faults, so none of them is ever retried.
 */

export type WorkcellErrorCode =
  | 'GRIPPER_OCCUPIED'
  | 'EMPTY_LOCATION'
  | 'GRIPPER_EMPTY'
  | 'OCCUPIED_LOCATION'
  | 'NO_PLATE'
  | 'INVALID_STATE'
  | 'UNKNOWN_DEVICE'
  | 'INVALID_PROTOCOL';

export interface WorkcellErrorContext {
  device?: string;
  plateId?: string;
  /** Plate found where another was expected */
  foundPlateId?: string | null;
}

export abstract class WorkcellError extends Error {
  abstract readonly code: WorkcellErrorCode;

  constructor(
    message: string,
    public readonly context: WorkcellErrorContext = {}
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Pick attempted while the gripper already holds a plate */
export class GripperOccupiedError extends WorkcellError {
  readonly code = 'GRIPPER_OCCUPIED';

  constructor(heldPlateId: string, device: string) {
    super(`Robot already holding plate ${heldPlateId}`, { device, plateId: heldPlateId });
  }
}

/** Pick attempted from a device that does not hold the expected plate */
export class EmptyLocationError extends WorkcellError {
  readonly code = 'EMPTY_LOCATION';

  constructor(device: string, plateId: string, foundPlateId: string | null) {
    super(
      foundPlateId === null
        ? `${device} has no plate to pick`
        : `${device} holds plate ${foundPlateId}, not ${plateId}`,
      { device, plateId, foundPlateId }
    );
  }
}

/** Place attempted with nothing in the gripper */
export class GripperEmptyError extends WorkcellError {
  readonly code = 'GRIPPER_EMPTY';

  constructor(device: string) {
    super(`Robot not holding a plate to place in ${device}`, { device });
  }
}

/** Place or load attempted into a device that already holds a plate */
export class OccupiedLocationError extends WorkcellError {
  readonly code = 'OCCUPIED_LOCATION';

  constructor(device: string, foundPlateId: string | null) {
    super(`${device} already has plate ${foundPlateId ?? 'unknown'}`, { device, foundPlateId });
  }
}

/** Process attempted on a device without the expected plate */
export class NoPlateError extends WorkcellError {
  readonly code = 'NO_PLATE';

  constructor(device: string, plateId?: string, foundPlateId: string | null = null) {
    super(
      foundPlateId === null || plateId === undefined
        ? `${device} has no plate to process`
        : `${device} holds plate ${foundPlateId}, not ${plateId}`,
      { device, plateId, foundPlateId }
    );
  }
}

/** Occupancy flag set twice in the same direction, or a plate loaded twice */
export class StateError extends WorkcellError {
  readonly code = 'INVALID_STATE';
}

export class UnknownDeviceError extends WorkcellError {
  readonly code = 'UNKNOWN_DEVICE';

  constructor(device: string) {
    super(`Unknown device "${device}"`, { device });
  }
}

export class ProtocolValidationError extends WorkcellError {
  readonly code = 'INVALID_PROTOCOL';

  constructor(public readonly problems: string[]) {
    super(`Invalid protocol: ${problems.join('; ')}`);
  }
}

export function isWorkcellError(error: unknown): error is WorkcellError {
  return error instanceof WorkcellError;
}
