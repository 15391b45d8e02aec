/**
 * Execution Log Slice
 *
 * Append-only transfer records and the live operation event stream.
 * This slice has no dependencies on other slices.
 */

import type { StateCreator } from 'zustand/vanilla';
import type { OperationEvent, TransferRecord } from '../../types';

export interface ExecutionLogSliceState {
  records: TransferRecord[];
  events: OperationEvent[];
}

export interface ExecutionLogSliceActions {
  appendRecord: (record: TransferRecord) => void;
  recordEvent: (event: OperationEvent) => void;
  clearLog: () => void;
}

export type ExecutionLogSlice = ExecutionLogSliceState & ExecutionLogSliceActions;

export const getDefaultExecutionLogState = (): ExecutionLogSliceState => ({
  records: [],
  events: [],
});

export const createExecutionLogSlice: StateCreator<
  ExecutionLogSlice,
  [],
  [],
  ExecutionLogSlice
> = (set) => ({
  ...getDefaultExecutionLogState(),

  appendRecord: (record: TransferRecord) =>
    set((state) => ({ records: [...state.records, record] })),

  recordEvent: (event: OperationEvent) =>
    set((state) => ({ events: [...state.events, event] })),

  clearLog: () => set(getDefaultExecutionLogState()),
});
