/**
 * Report Rendering
 *
 * Turns run results into printable lines. Nothing here writes to the console;
 * the CLI decides where lines go.
 */

import type { Device, OperationEvent, TransferRecord } from '../../types';
import type { ProtocolSummary } from './protocolRunner';

const RULE_WIDTH = 70;

export const rule = (char = '='): string => char.repeat(RULE_WIDTH);

/** Wall-clock time of day, HH:MM:SS */
export function formatClock(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function describeEvent(event: OperationEvent): string {
  switch (event.type) {
    case 'move':
      return `Moved to ${event.target}: ${event.distanceMm.toFixed(1)}mm in ${(event.durationMs / 1000).toFixed(2)}s`;
    case 'pick':
      return `Picked ${event.plateId} from ${event.device}`;
    case 'place':
      return `Placed ${event.plateId} in ${event.device}`;
    case 'process':
      return `${event.device} processed ${event.plateId} (${(event.durationMs / 1000).toFixed(1)}s)`;
    case 'load':
      return `Loaded ${event.plateId} into ${event.device}`;
    case 'failed':
      return `${event.operation} rejected [${event.code}]: ${event.message}`;
  }
}

export function formatProtocolLog(records: readonly TransferRecord[]): string[] {
  const lines = [
    rule(),
    'PROTOCOL EXECUTION LOG',
    rule(),
    `${'Time'.padEnd(10)} ${'Plate ID'.padEnd(25)} ${'From'.padEnd(15)} ${'To'.padEnd(15)} Status`,
    rule('-'),
  ];

  for (const record of records) {
    const status = record.success ? 'OK' : `FAILED (${record.errorReason ?? 'unknown error'})`;
    lines.push(
      `${formatClock(record.timestamp).padEnd(10)} ${record.plateId.padEnd(25)} ` +
      `${record.fromDevice.padEnd(15)} ${record.toDevice.padEnd(15)} ${status}`
    );
  }

  lines.push(rule());
  return lines;
}

export function formatRunSummary(summary: ProtocolSummary): string[] {
  return [
    `Duration: ${(summary.simulatedMs / 1000).toFixed(1)} seconds (simulated)`,
    `Robot Movements: ${summary.robotMoves}`,
    `Total Transfers: ${summary.totalTransfers}`,
    `Successful: ${summary.successfulTransfers}`,
    `Failed: ${summary.failedTransfers}`,
    `Success Rate: ${summary.successRate.toFixed(1)}%`,
    `Distance Traveled: ${summary.distanceTravelledMm.toFixed(0)}mm`,
  ];
}

export function formatDeviceStatus(devices: readonly Device[]): string[] {
  const lines = [
    rule(),
    'FINAL DEVICE STATUS',
    rule(),
    `${'Device'.padEnd(20)} ${'Status'.padEnd(15)} Plate`,
    rule('-'),
  ];

  for (const device of devices) {
    lines.push(`${device.name.padEnd(20)} ${device.state.padEnd(15)} ${device.plateId ?? 'Empty'}`);
  }

  lines.push(rule());
  return lines;
}
