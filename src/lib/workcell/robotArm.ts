/**
 * Robot Arm Transitions
 *
 * The transfer state machine. Each operation is a pure function of the current
 * workcell state: it either returns the complete next state together with the
 * event describing what happened, or returns the typed error and leaves the
 * input untouched. Nothing here sleeps or prints; callers decide whether to
 * wait out `event.durationMs` and how to report it.
 */

import type {
  MotionTiming,
  OperationEvent,
  Plate,
  Position,
  WorkcellState,
} from '../../types';
import { MOTION } from '../../config/workcell';
import { markFree, markOccupied, setDeviceState } from './device';
import {
  EmptyLocationError,
  GripperEmptyError,
  GripperOccupiedError,
  NoPlateError,
  OccupiedLocationError,
  StateError,
  isWorkcellError,
  type WorkcellError,
} from './errors';
import { IN_GRIPPER, atDevice, createPlate, describeLocation, relocate } from './plate';
import { distanceTo, formatPosition } from './position';
import { getDevice, getPlate } from './state';

export type OperationName = 'move' | 'pick' | 'place' | 'process' | 'load';

export type TransitionResult =
  | { ok: true; state: WorkcellState; event: OperationEvent }
  | { ok: false; error: WorkcellError; event: OperationEvent };

export const DEFAULT_TIMING: MotionTiming = {
  msPerMm: MOTION.MS_PER_MM,
  gripMs: MOTION.GRIP_MS,
};

interface Committed {
  state: WorkcellState;
  event: OperationEvent;
}

/**
 * Run a transition body, turning workcell errors into a failed result.
 * Anything else is a programming error and propagates.
 */
function attempt(operation: OperationName, body: () => Committed): TransitionResult {
  try {
    const { state, event } = body();
    return { ok: true, state, event };
  } catch (error) {
    if (!isWorkcellError(error)) throw error;
    return {
      ok: false,
      error,
      event: {
        type: 'failed',
        operation,
        code: error.code,
        message: error.message,
        durationMs: 0,
      },
    };
  }
}

function plateOrNew(state: WorkcellState, plateId: string): Plate {
  return getPlate(state, plateId) ?? createPlate(plateId);
}

/**
 * Move the arm to a device's position or to an explicit point. Never fails for a
 * known target; travel time is `distance * msPerMm`.
 */
export function moveTo(
  state: WorkcellState,
  target: string | Position,
  timing: MotionTiming = DEFAULT_TIMING
): TransitionResult {
  return attempt('move', () => {
    const destination = typeof target === 'string' ? getDevice(state, target).position : target;
    const label = typeof target === 'string' ? target : (target.name ?? formatPosition(target));
    const from = state.robot.currentPosition;
    const distanceMm = distanceTo(from, destination);
    const durationMs = distanceMm * timing.msPerMm;

    return {
      state: {
        ...state,
        robot: {
          ...state.robot,
          currentPosition: destination,
          movesCount: state.robot.movesCount + 1,
          distanceTravelledMm: state.robot.distanceTravelledMm + distanceMm,
        },
        elapsedMs: state.elapsedMs + durationMs,
      },
      event: { type: 'move', from, to: destination, target: label, distanceMm, durationMs },
    };
  });
}

/**
 * Take `plateId` out of a device into the empty gripper.
 */
export function pick(
  state: WorkcellState,
  deviceName: string,
  plateId: string,
  timing: MotionTiming = DEFAULT_TIMING
): TransitionResult {
  return attempt('pick', () => {
    const device = getDevice(state, deviceName);
    const held = state.robot.grippedPlateId;

    if (held !== null) {
      throw new GripperOccupiedError(held, deviceName);
    }
    if (!device.occupied || device.plateId !== plateId) {
      throw new EmptyLocationError(deviceName, plateId, device.plateId);
    }

    return {
      state: {
        ...state,
        devices: { ...state.devices, [deviceName]: markFree(device) },
        plates: { ...state.plates, [plateId]: relocate(plateOrNew(state, plateId), IN_GRIPPER) },
        robot: { ...state.robot, grippedPlateId: plateId },
        elapsedMs: state.elapsedMs + timing.gripMs,
      },
      event: { type: 'pick', device: deviceName, plateId, durationMs: timing.gripMs },
    };
  });
}

/**
 * Release the gripped plate into a free device.
 */
export function place(
  state: WorkcellState,
  deviceName: string,
  timing: MotionTiming = DEFAULT_TIMING
): TransitionResult {
  return attempt('place', () => {
    const device = getDevice(state, deviceName);
    const plateId = state.robot.grippedPlateId;

    if (plateId === null) {
      throw new GripperEmptyError(deviceName);
    }
    if (device.occupied) {
      throw new OccupiedLocationError(deviceName, device.plateId);
    }

    return {
      state: {
        ...state,
        devices: { ...state.devices, [deviceName]: markOccupied(device, plateId) },
        plates: {
          ...state.plates,
          [plateId]: relocate(plateOrNew(state, plateId), atDevice(deviceName)),
        },
        robot: { ...state.robot, grippedPlateId: null },
        elapsedMs: state.elapsedMs + timing.gripMs,
      },
      event: { type: 'place', device: deviceName, plateId, durationMs: timing.gripMs },
    };
  });
}

/**
 * Run a device cycle on the plate it holds. When `plateId` is given the device
 * must hold exactly that plate. The device passes through BUSY and is committed
 * back as IDLE; the plate does not move.
 */
export function process(
  state: WorkcellState,
  deviceName: string,
  durationSeconds: number,
  plateId?: string
): TransitionResult {
  if (!Number.isFinite(durationSeconds) || durationSeconds < 0) {
    throw new RangeError(`Process duration must be a non-negative number, got ${durationSeconds}`);
  }

  return attempt('process', () => {
    const device = getDevice(state, deviceName);
    const held = device.plateId;

    if (!device.occupied || held === null || (plateId !== undefined && held !== plateId)) {
      throw new NoPlateError(deviceName, plateId, held);
    }

    const busy = setDeviceState(device, 'BUSY');
    const done = setDeviceState(busy, 'IDLE');
    const durationMs = durationSeconds * 1000;

    return {
      state: {
        ...state,
        devices: { ...state.devices, [deviceName]: done },
        elapsedMs: state.elapsedMs + durationMs,
      },
      event: {
        type: 'process',
        device: deviceName,
        plateId: held,
        states: [busy.state, done.state],
        durationMs,
      },
    };
  });
}

/**
 * Seed a plate into a device before (or during) a run. Registers the plate if
 * it is new; a plate that already sits somewhere cannot be loaded again.
 */
export function loadPlate(
  state: WorkcellState,
  deviceName: string,
  plateId: string
): TransitionResult {
  return attempt('load', () => {
    const device = getDevice(state, deviceName);
    const plate = plateOrNew(state, plateId);

    if (device.occupied) {
      throw new OccupiedLocationError(deviceName, device.plateId);
    }
    if (plate.location.kind !== 'NONE') {
      throw new StateError(
        `Plate ${plateId} is already at ${describeLocation(plate.location)}`,
        { device: deviceName, plateId }
      );
    }

    return {
      state: {
        ...state,
        devices: { ...state.devices, [deviceName]: markOccupied(device, plateId) },
        plates: { ...state.plates, [plateId]: relocate(plate, atDevice(deviceName)) },
      },
      event: { type: 'load', device: deviceName, plateId, durationMs: 0 },
    };
  });
}
