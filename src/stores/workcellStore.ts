/**
 * Workcell store using Zustand (vanilla, no React binding)
 *
 * Composes the slices from ./slices/:
 * - workcellSlice: devices, plates, robot arm and operations
 * - executionLogSlice: transfer records and operation events
 *
 * A store is created per run and owned by whoever drives it; there is no
 * module-level instance.
 */

import { createStore, type StoreApi } from 'zustand/vanilla';
import type { DeviceDefinition, MotionTiming, Position } from '../types';
import {
  DEVICE_ROSTER,
  HOME_POSITION,
  INITIAL_PLATE_DEVICE,
  SCREENING_PLATE_ID,
  WORKCELL_NAME,
} from '../config/workcell';
import {
  createExecutionLogSlice,
  createWorkcellSlice,
  type ExecutionLogSlice,
  type WorkcellSlice,
} from './slices';

export type WorkcellStore = WorkcellSlice & ExecutionLogSlice & {
  /** Clear log and restore the initial workcell */
  resetAll: () => void;
};

export type WorkcellStoreApi = StoreApi<WorkcellStore>;

export interface WorkcellStoreOptions {
  name?: string;
  devices?: readonly DeviceDefinition[];
  home?: Position;
  timing?: MotionTiming;
}

export function createWorkcellStore(options: WorkcellStoreOptions = {}): WorkcellStoreApi {
  const sliceOptions = {
    name: options.name ?? WORKCELL_NAME,
    devices: options.devices ?? DEVICE_ROSTER,
    home: options.home ?? HOME_POSITION,
    timing: options.timing,
  };

  return createStore<WorkcellStore>()((set, get, store) => ({
    ...createExecutionLogSlice(set, get, store),
    ...createWorkcellSlice(sliceOptions)(set, get, store),

    resetAll: () => {
      get().resetWorkcell();
      get().clearLog();
    },
  }));
}

/**
 * Store for the cell screening workcell with its plate already in storage
 */
export function createScreeningWorkcell(options: WorkcellStoreOptions = {}): WorkcellStoreApi {
  const store = createWorkcellStore(options);
  const loaded = store.getState().loadPlate(INITIAL_PLATE_DEVICE, SCREENING_PLATE_ID);
  if (!loaded.ok) {
    throw loaded.error;
  }
  return store;
}
