/**
 * Workcell Module
 *
 * Transfer state machine, protocol runner and report rendering.
 *
 * Usage:
 *   import { runProtocol } from './workcell';
 *   import { createScreeningWorkcell } from '../../stores/workcellStore';
 *
 *   const store = createScreeningWorkcell();
 *   const result = await runProtocol(store, CELL_SCREENING_PROTOCOL);
 *   if (!result.completed) {
 *     // result.records ends with the failed transfer
 *   }
 */

// Geometry
export { createPosition, distanceTo, samePosition, formatPosition } from './position';

// Devices and plates
export { createDevice, deviceFromDefinition, markOccupied, markFree, setDeviceState } from './device';
export {
  createPlate,
  relocate,
  atDevice,
  isAtDevice,
  describeLocation,
  IN_GRIPPER,
  NO_LOCATION,
} from './plate';

// State aggregate
export {
  createWorkcellState,
  getDevice,
  getPlate,
  hasDevice,
  listDevices,
  type WorkcellStateOptions,
} from './state';
export { checkInvariants } from './invariants';

// Errors
export {
  WorkcellError,
  GripperOccupiedError,
  EmptyLocationError,
  GripperEmptyError,
  OccupiedLocationError,
  NoPlateError,
  StateError,
  UnknownDeviceError,
  ProtocolValidationError,
  isWorkcellError,
  type WorkcellErrorCode,
  type WorkcellErrorContext,
} from './errors';

// Robot arm transitions
export {
  moveTo,
  pick,
  place,
  process,
  loadPlate,
  DEFAULT_TIMING,
  type OperationName,
  type TransitionResult,
} from './robotArm';

// Runner
export {
  runProtocol,
  validateProtocol,
  type RunOptions,
  type ProtocolRunResult,
  type ProtocolSummary,
} from './protocolRunner';

// Reports
export {
  describeEvent,
  formatClock,
  formatDeviceStatus,
  formatProtocolLog,
  formatRunSummary,
  rule,
} from './report';
