import { describe, it, expect } from 'vitest';
import { createDevice, markFree, markOccupied, setDeviceState } from '../lib/workcell/device';
import { createPlate, relocate, atDevice, describeLocation, IN_GRIPPER } from '../lib/workcell/plate';
import { StateError } from '../lib/workcell/errors';
import { createPosition } from '../lib/workcell/position';

const position = createPosition(100, 200, 50, 'Storage');

describe('Device', () => {
  it('should start free and idle', () => {
    const device = createDevice('Storage', position, 'Cold storage');
    expect(device).toEqual({
      name: 'Storage',
      position,
      purpose: 'Cold storage',
      occupied: false,
      plateId: null,
      state: 'IDLE',
    });
  });

  it('should mark occupied and free without mutating the original', () => {
    const free = createDevice('Storage', position);
    const occupied = markOccupied(free, 'P1');

    expect(occupied.occupied).toBe(true);
    expect(occupied.plateId).toBe('P1');
    expect(free.occupied).toBe(false);

    const freedAgain = markFree(occupied);
    expect(freedAgain.occupied).toBe(false);
    expect(freedAgain.plateId).toBeNull();
  });

  it('should reject occupying an occupied device', () => {
    const occupied = markOccupied(createDevice('Storage', position), 'P1');
    expect(() => markOccupied(occupied, 'P2')).toThrow(StateError);
    expect(() => markOccupied(occupied, 'P2')).toThrow('Storage is already occupied by P1');
  });

  it('should reject freeing a free device', () => {
    expect(() => markFree(createDevice('Storage', position))).toThrow('Storage is already free');
  });

  it('should allow any state transition', () => {
    const device = createDevice('Centrifuge', position);
    const errored = setDeviceState(setDeviceState(device, 'BUSY'), 'ERROR');
    expect(errored.state).toBe('ERROR');
    expect(setDeviceState(errored, 'IDLE').state).toBe('IDLE');
  });

  it('should return the same object when the state is unchanged', () => {
    const device = createDevice('Centrifuge', position);
    expect(setDeviceState(device, 'IDLE')).toBe(device);
  });
});

describe('Plate', () => {
  it('should start with no location', () => {
    expect(createPlate('P1').location).toEqual({ kind: 'NONE' });
  });

  it('should relocate without validation', () => {
    const plate = relocate(createPlate('P1', atDevice('Storage')), IN_GRIPPER);
    expect(plate).toEqual({ id: 'P1', location: { kind: 'IN_GRIPPER' } });
  });

  it('should describe each location kind', () => {
    expect(describeLocation(atDevice('PlateReader'))).toBe('PlateReader');
    expect(describeLocation(IN_GRIPPER)).toBe('IN_GRIPPER');
    expect(describeLocation({ kind: 'NONE' })).toBe('NONE');
  });
});
