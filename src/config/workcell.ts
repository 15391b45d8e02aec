/**
 * Workcell Configuration
 *
 * Static device roster, motion timing and the cell line screening protocol.
 * Loaded once at startup and never mutated by the core.
 */

import type { DeviceDefinition, Position, TransferStep } from '../types';
import { createPosition } from '../lib/workcell/position';

/**
 * Motion timing constants
 */
export const MOTION = {
  /** Simulated travel time per millimetre (100 mm/s) */
  MS_PER_MM: 10,
  /** Simulated time for a gripper open/close */
  GRIP_MS: 500,
  /** Upper bound on any single real wait when the CLI sleeps */
  MAX_REAL_WAIT_MS: 1000,
} as const;

export const WORKCELL_NAME = 'Cell Line Screening Workcell';

export const HOME_POSITION: Position = createPosition(0, 0, 0, 'Home');

export const SCREENING_PLATE_ID = 'CELL_CULTURE_PLATE_001';

export const DEVICE_ROSTER: readonly DeviceDefinition[] = [
  {
    name: 'Storage',
    position: createPosition(100, 200, 50, 'Storage'),
    purpose: 'Cold storage for plates',
  },
  {
    name: 'LiquidHandler',
    position: createPosition(400, 200, 100, 'LiquidHandler'),
    purpose: 'Adds cell culture media and reagents',
  },
  {
    name: 'ThermalCycler',
    position: createPosition(700, 200, 80, 'ThermalCycler'),
    purpose: 'Incubates at 37°C',
  },
  {
    name: 'PlateReader',
    position: createPosition(1000, 200, 90, 'PlateReader'),
    purpose: 'Reads absorbance at 450nm',
  },
  {
    name: 'Centrifuge',
    position: createPosition(550, 400, 75, 'Centrifuge'),
    purpose: 'Pellets cells',
  },
];

/** Device the screening plate is loaded into before a run */
export const INITIAL_PLATE_DEVICE = 'Storage';

function transfer(fromDevice: string, toDevice: string, label: string): TransferStep {
  return { action: 'PICK_AND_MOVE_AND_PLACE', plateId: SCREENING_PLATE_ID, fromDevice, toDevice, label };
}

function processOn(device: string, durationSeconds: number, label: string): TransferStep {
  return {
    action: 'PROCESS',
    plateId: SCREENING_PLATE_ID,
    fromDevice: device,
    toDevice: device,
    durationSeconds,
    label,
  };
}

export const CELL_SCREENING_PROTOCOL: readonly TransferStep[] = [
  transfer('Storage', 'LiquidHandler', 'Retrieve plate from cold storage'),
  processOn('LiquidHandler', 3, 'Add cell culture media and reagents'),
  transfer('LiquidHandler', 'Centrifuge', 'Move to centrifuge'),
  processOn('Centrifuge', 2, 'Centrifuge to pellet cells'),
  transfer('Centrifuge', 'ThermalCycler', 'Transfer to thermal cycler for incubation'),
  processOn('ThermalCycler', 4, 'Incubate at 37°C'),
  transfer('ThermalCycler', 'PlateReader', 'Transfer to plate reader for analysis'),
  processOn('PlateReader', 2, 'Read absorbance at 450nm'),
  transfer('PlateReader', 'Storage', 'Return plate to storage'),
  {
    action: 'RETURN_HOME',
    plateId: SCREENING_PLATE_ID,
    fromDevice: 'Storage',
    toDevice: 'Home',
    label: 'Robot returning to home position',
  },
];
