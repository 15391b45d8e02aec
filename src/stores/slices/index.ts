/**
 * Workcell Store Slices
 *
 * Modular state slices that compose into the workcell store.
 */

// Workcell Slice - devices, plates, robot arm and the operations on them
export {
  createWorkcellSlice,
  getDefaultWorkcellState,
  type WorkcellSlice,
  type WorkcellSliceState,
  type WorkcellSliceActions,
  type WorkcellSliceOptions,
} from './workcellSlice';

// Execution Log Slice - transfer records and operation events
export {
  createExecutionLogSlice,
  getDefaultExecutionLogState,
  type ExecutionLogSlice,
  type ExecutionLogSliceState,
  type ExecutionLogSliceActions,
} from './executionLogSlice';
