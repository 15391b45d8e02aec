// Spatial Types

/** Point in the workcell frame, millimetres */
export interface Position {
  readonly x: number;
  readonly y: number;
  readonly z: number;
  /** Display label, ignored by comparisons */
  readonly name?: string;
}

// Device Types
export type DeviceState = 'IDLE' | 'BUSY' | 'ERROR';

export interface Device {
  readonly name: string;
  readonly position: Position;
  /** What the station does, e.g. "Centrifuge to pellet cells" */
  readonly purpose: string;
  readonly occupied: boolean;
  /** Plate currently held by the station, null when free */
  readonly plateId: string | null;
  readonly state: DeviceState;
}

/** Static roster entry used to build a device */
export interface DeviceDefinition {
  name: string;
  position: Position;
  purpose: string;
}

// Plate Types
export type PlateLocation =
  | { readonly kind: 'DEVICE'; readonly device: string }
  | { readonly kind: 'IN_GRIPPER' }
  | { readonly kind: 'NONE' };

export interface Plate {
  readonly id: string;
  readonly location: PlateLocation;
}

// Robot Types
export interface RobotArmState {
  readonly currentPosition: Position;
  /** At most one plate fits in the gripper */
  readonly grippedPlateId: string | null;
  readonly movesCount: number;
  readonly distanceTravelledMm: number;
}

/** Aggregate of everything a transition may read or change */
export interface WorkcellState {
  readonly name: string;
  readonly devices: Readonly<Record<string, Device>>;
  readonly plates: Readonly<Record<string, Plate>>;
  readonly robot: RobotArmState;
  /** Simulated time consumed by all committed operations */
  readonly elapsedMs: number;
}

export interface MotionTiming {
  /** Simulated travel time per millimetre */
  msPerMm: number;
  /** Simulated time for a gripper open/close */
  gripMs: number;
}

// Protocol Types
export type StepAction = 'PICK_AND_MOVE_AND_PLACE' | 'PROCESS' | 'RETURN_HOME';

export interface TransferStep {
  action: StepAction;
  plateId: string;
  /** Source device; the processing device for PROCESS steps */
  fromDevice: string;
  /** Destination device; equals fromDevice for PROCESS steps */
  toDevice: string;
  /** Required for PROCESS steps */
  durationSeconds?: number;
  /** Human-readable step title */
  label?: string;
}

export interface TransferRecord {
  /** Zero-based index of the protocol step */
  step: number;
  action: StepAction;
  plateId: string;
  fromDevice: string;
  toDevice: string;
  /** When the step started */
  timestamp: Date;
  completedAt: Date;
  /** Simulated duration of every operation the step committed */
  durationMs: number;
  success: boolean;
  errorCode?: string;
  errorReason?: string;
}

// Operation events, emitted after each committed or rejected operation
export type OperationEvent =
  | {
      type: 'move';
      from: Position;
      to: Position;
      target: string;
      distanceMm: number;
      durationMs: number;
    }
  | { type: 'pick'; device: string; plateId: string; durationMs: number }
  | { type: 'place'; device: string; plateId: string; durationMs: number }
  | {
      type: 'process';
      device: string;
      plateId: string;
      /** Device states passed through while processing */
      states: DeviceState[];
      durationMs: number;
    }
  | { type: 'load'; device: string; plateId: string; durationMs: number }
  | {
      type: 'failed';
      operation: 'move' | 'pick' | 'place' | 'process' | 'load';
      code: string;
      message: string;
      durationMs: number;
    };
