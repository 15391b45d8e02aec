import { describe, it, expect, afterEach } from 'vitest';
import { createScreeningWorkcell, createWorkcellStore } from '../stores/workcellStore';
import { addLogHandler, type LogEntry } from '../lib/logger';
import { checkInvariants } from '../lib/workcell/invariants';
import { createPosition } from '../lib/workcell/position';

describe('workcellStore', () => {
  let removeHandler: (() => void) | undefined;

  afterEach(() => {
    removeHandler?.();
    removeHandler = undefined;
  });

  it('should build the default roster with the robot at home', () => {
    const { workcell } = createWorkcellStore().getState();

    expect(Object.keys(workcell.devices)).toEqual([
      'Storage',
      'LiquidHandler',
      'ThermalCycler',
      'PlateReader',
      'Centrifuge',
    ]);
    expect(workcell.robot.currentPosition).toEqual({ x: 0, y: 0, z: 0, name: 'Home' });
    expect(workcell.plates).toEqual({});
  });

  it('should seed the screening plate into storage', () => {
    const { workcell, events } = createScreeningWorkcell().getState();

    expect(workcell.devices.Storage.plateId).toBe('CELL_CULTURE_PLATE_001');
    expect(events).toEqual([
      { type: 'load', device: 'Storage', plateId: 'CELL_CULTURE_PLATE_001', durationMs: 0 },
    ]);
  });

  it('should commit successful operations', () => {
    const store = createScreeningWorkcell();
    store.getState().moveTo('Storage');
    store.getState().pick('Storage', 'CELL_CULTURE_PLATE_001');

    const { workcell } = store.getState();
    expect(workcell.robot.grippedPlateId).toBe('CELL_CULTURE_PLATE_001');
    expect(workcell.robot.movesCount).toBe(1);
    expect(checkInvariants(workcell)).toEqual([]);
  });

  it('should leave the workcell untouched when an operation is rejected', () => {
    const store = createScreeningWorkcell();
    const before = store.getState().workcell;

    const result = store.getState().place('Centrifuge');

    expect(result.ok).toBe(false);
    expect(store.getState().workcell).toBe(before);
    expect(store.getState().events.at(-1)).toMatchObject({ type: 'failed', operation: 'place', code: 'GRIPPER_EMPTY' });
  });

  it('should not change state when only read', () => {
    const store = createScreeningWorkcell();
    const first = store.getState().workcell;

    expect(store.getState().workcell.devices.Storage.plateId).toBe('CELL_CULTURE_PLATE_001');
    const second = store.getState().workcell;

    expect(second).toBe(first);
    expect(second.devices.Storage.occupied).toBe(true);
    expect(second.plates.CELL_CULTURE_PLATE_001.location).toEqual({ kind: 'DEVICE', device: 'Storage' });
    expect(second.robot.grippedPlateId).toBeNull();
  });

  it('should return home to the configured position', () => {
    const home = createPosition(10, 10, 10, 'Dock');
    const store = createWorkcellStore({ home });
    store.getState().moveTo('PlateReader');
    store.getState().returnHome();

    expect(store.getState().workcell.robot.currentPosition).toBe(home);
  });

  it('should use custom timing', () => {
    const store = createWorkcellStore({ timing: { msPerMm: 1, gripMs: 50 } });
    store.getState().loadPlate('Storage', 'P1');
    store.getState().pick('Storage', 'P1');

    expect(store.getState().workcell.elapsedMs).toBe(50);
  });

  it('should set device state informationally', () => {
    const store = createWorkcellStore();
    store.getState().setDeviceState('Centrifuge', 'ERROR');
    expect(store.getState().workcell.devices.Centrifuge.state).toBe('ERROR');
  });

  it('should reset workcell and log', () => {
    const store = createScreeningWorkcell();
    store.getState().moveTo('Storage');
    store.getState().appendRecord({
      step: 0,
      action: 'PICK_AND_MOVE_AND_PLACE',
      plateId: 'P1',
      fromDevice: 'Storage',
      toDevice: 'LiquidHandler',
      timestamp: new Date(0),
      completedAt: new Date(0),
      durationMs: 0,
      success: true,
    });

    store.getState().resetAll();

    const state = store.getState();
    expect(state.records).toEqual([]);
    expect(state.events).toEqual([]);
    expect(state.workcell.robot.movesCount).toBe(0);
    expect(state.workcell.devices.Storage.occupied).toBe(false);
  });

  it('should log rejected operations as warnings', () => {
    const entries: LogEntry[] = [];
    removeHandler = addLogHandler(entry => entries.push(entry));

    createWorkcellStore().getState().pick('Storage', 'P9');

    const warnings = entries.filter(e => e.level === 'warn');
    expect(warnings).toHaveLength(1);
    expect(warnings[0].namespace).toBe('WorkcellStore');
    expect(warnings[0].message).toBe('pick rejected [EMPTY_LOCATION]: Storage has no plate to pick');
  });

  it('should return an unknown device error for constructor', () => {
    const store = createWorkcellStore();
    const result = store.getState().moveTo('constructor');

    expect(result.ok).toBe(false);
    expect(result.event).toEqual({
      type: 'failed',
      operation: 'move',
      code: 'UNKNOWN_DEVICE',
      message: 'Unknown device "constructor"',
      durationMs: 0,
    });
    expect(store.getState().workcell.robot.movesCount).toBe(0);
    expect(store.getState().events).toHaveLength(1);
  });
});
