/**
 * Workcell State Slice
 *
 * Holds the WorkcellState aggregate and exposes the robot operations as store
 * actions. Each action runs the matching pure transition against the current
 * snapshot and commits the result only when it succeeded, so a rejected
 * operation leaves devices, plates and gripper exactly as they were.
 *
 * Every outcome, committed or rejected, is forwarded to the execution log slice.
 */

import type { StateCreator } from 'zustand/vanilla';
import type { DeviceState, MotionTiming, Position, WorkcellState } from '../../types';
import {
  DEFAULT_TIMING,
  loadPlate,
  moveTo,
  pick,
  place,
  process,
  type TransitionResult,
} from '../../lib/workcell/robotArm';
import { setDeviceState } from '../../lib/workcell/device';
import { createWorkcellState, getDevice, type WorkcellStateOptions } from '../../lib/workcell/state';
import { describeEvent } from '../../lib/workcell/report';
import { loggers } from '../../lib/logger';
import type { ExecutionLogSlice } from './executionLogSlice';

const log = loggers.store;

export interface WorkcellSliceState {
  workcell: WorkcellState;
  home: Position;
  timing: MotionTiming;
}

export interface WorkcellSliceActions {
  moveTo: (target: string | Position) => TransitionResult;
  returnHome: () => TransitionResult;
  pick: (device: string, plateId: string) => TransitionResult;
  place: (device: string) => TransitionResult;
  process: (device: string, durationSeconds: number, plateId?: string) => TransitionResult;
  loadPlate: (device: string, plateId: string) => TransitionResult;
  /** Informational status change, e.g. flagging a faulted device */
  setDeviceState: (device: string, state: DeviceState) => void;
  resetWorkcell: () => void;
}

export type WorkcellSlice = WorkcellSliceState & WorkcellSliceActions;

export interface WorkcellSliceOptions extends WorkcellStateOptions {
  timing?: MotionTiming;
}

export const getDefaultWorkcellState = (options: WorkcellSliceOptions): WorkcellSliceState => ({
  workcell: createWorkcellState(options),
  home: options.home,
  timing: options.timing ?? DEFAULT_TIMING,
});

export const createWorkcellSlice = (
  options: WorkcellSliceOptions
): StateCreator<WorkcellSlice & ExecutionLogSlice, [], [], WorkcellSlice> => (set, get) => {
  const commit = (result: TransitionResult): TransitionResult => {
    if (result.ok) {
      set({ workcell: result.state });
      log.debug(describeEvent(result.event));
    } else {
      log.warn(describeEvent(result.event), result.error.context);
    }
    get().recordEvent(result.event);
    return result;
  };

  return {
    ...getDefaultWorkcellState(options),

    moveTo: (target: string | Position) =>
      commit(moveTo(get().workcell, target, get().timing)),

    returnHome: () =>
      commit(moveTo(get().workcell, get().home, get().timing)),

    pick: (device: string, plateId: string) =>
      commit(pick(get().workcell, device, plateId, get().timing)),

    place: (device: string) =>
      commit(place(get().workcell, device, get().timing)),

    process: (device: string, durationSeconds: number, plateId?: string) =>
      commit(process(get().workcell, device, durationSeconds, plateId)),

    loadPlate: (device: string, plateId: string) =>
      commit(loadPlate(get().workcell, device, plateId)),

    setDeviceState: (device: string, state: DeviceState) => {
      const { workcell } = get();
      const current = getDevice(workcell, device);
      set({
        workcell: {
          ...workcell,
          devices: { ...workcell.devices, [device]: setDeviceState(current, state) },
        },
      });
    },

    resetWorkcell: () => set(getDefaultWorkcellState(options)),
  };
};
