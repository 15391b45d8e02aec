/**
 * Protocol Runner
 *
 * Drives the robot arm through an ordered list of protocol steps against a
 * workcell store, appending one TransferRecord per attempted transfer.
 *
 * Every rejected operation is a logical impossibility rather than a transient
 * fault, so nothing is retried: by default the first failure is recorded and
 * the rest of the protocol is abandoned.
 */

import type { OperationEvent, TransferRecord, TransferStep, WorkcellState } from '../../types';
import type { WorkcellStoreApi } from '../../stores/workcellStore';
import type { TransitionResult } from './robotArm';
import { ProtocolValidationError } from './errors';
import { samePosition } from './position';
import { getDevice, hasDevice } from './state';
import { loggers } from '../logger';

const log = loggers.runner;

/**
 * Execution options for running a protocol
 */
export interface RunOptions {
  /** Stop on first failure vs record it and continue */
  stopOnFailure?: boolean;
  /**
   * Called with each operation's simulated duration once it has been committed.
   * Resolve immediately to skip real time; the default does.
   */
  wait?: (ms: number) => Promise<void>;
  /** Real waits are divided by this; simulated time is not */
  speedMultiplier?: number;
  /** Cap on a single real wait */
  maxWaitMs?: number;
  /** Timestamp source for records */
  clock?: () => Date;
  /** Callback for every operation outcome */
  onEvent?: (event: OperationEvent) => void;
  /** Callback before a step starts */
  onStepStart?: (stepIndex: number, step: TransferStep) => void;
  /** Callback after a step finishes; receives the store so callers can inspect or perturb it */
  onStepComplete?: (
    stepIndex: number,
    step: TransferStep,
    success: boolean,
    store: WorkcellStoreApi
  ) => void;
}

export interface ProtocolSummary {
  startedAt: Date;
  finishedAt: Date;
  /** Simulated time of everything committed during the run */
  simulatedMs: number;
  robotMoves: number;
  distanceTravelledMm: number;
  totalTransfers: number;
  successfulTransfers: number;
  failedTransfers: number;
  /** Percentage, 0 when nothing was recorded */
  successRate: number;
}

export interface ProtocolRunResult {
  /** Records appended during this run, in order */
  records: TransferRecord[];
  /** True when every step ran and none failed */
  completed: boolean;
  /** Index of the first failed step, null if none failed */
  failedStep: number | null;
  stepsExecuted: number;
  finalState: WorkcellState;
  summary: ProtocolSummary;
}

const DEFAULT_OPTIONS: Required<Omit<RunOptions, 'onEvent' | 'onStepStart' | 'onStepComplete'>> = {
  stopOnFailure: true,
  wait: () => Promise.resolve(),
  speedMultiplier: 1.0,
  maxWaitMs: Number.POSITIVE_INFINITY,
  clock: () => new Date(),
};

type ResolvedOptions = typeof DEFAULT_OPTIONS & RunOptions;

/**
 * Check a protocol against the workcell roster before anything moves.
 *
 * @returns One message per problem; empty when the protocol can be run
 */
export function validateProtocol(
  state: WorkcellState,
  protocol: readonly TransferStep[]
): string[] {
  const problems: string[] = [];

  if (protocol.length === 0) {
    problems.push('protocol has no steps');
  }

  protocol.forEach((step, i) => {
    const where = `step ${i + 1}`;

    if (step.action === 'RETURN_HOME') return;

    if (!step.plateId) {
      problems.push(`${where}: plateId is required`);
    }
    if (!hasDevice(state, step.fromDevice)) {
      problems.push(`${where}: unknown device "${step.fromDevice}"`);
    }

    if (step.action === 'PICK_AND_MOVE_AND_PLACE') {
      if (!hasDevice(state, step.toDevice)) {
        problems.push(`${where}: unknown device "${step.toDevice}"`);
      }
    } else {
      const secs = step.durationSeconds;
      if (secs === undefined || !Number.isFinite(secs) || secs <= 0) {
        problems.push(`${where}: PROCESS needs a positive durationSeconds`);
      }
      if (step.toDevice !== step.fromDevice) {
        problems.push(`${where}: PROCESS must name the same device as source and destination`);
      }
    }
  });

  return problems;
}

interface StepOutcome {
  success: boolean;
  record?: TransferRecord;
}

async function executeStep(
  store: WorkcellStoreApi,
  step: TransferStep,
  stepIndex: number,
  opts: ResolvedOptions
): Promise<StepOutcome> {
  const actions = store.getState();
  const timestamp = opts.clock();
  let durationMs = 0;

  const perform = async (operation: () => TransitionResult): Promise<TransitionResult> => {
    const result = operation();
    opts.onEvent?.(result.event);
    if (result.ok) {
      durationMs += result.event.durationMs;
      const realMs = Math.min(result.event.durationMs / opts.speedMultiplier, opts.maxWaitMs);
      await opts.wait(realMs);
    }
    return result;
  };

  const toRecord = (result?: TransitionResult): TransferRecord => {
    const record: TransferRecord = {
      step: stepIndex,
      action: step.action,
      plateId: step.plateId,
      fromDevice: step.fromDevice,
      toDevice: step.toDevice,
      timestamp,
      completedAt: opts.clock(),
      durationMs,
      success: result === undefined || result.ok,
    };
    if (result && !result.ok) {
      record.errorCode = result.error.code;
      record.errorReason = result.error.message;
    }
    return record;
  };

  switch (step.action) {
    case 'RETURN_HOME': {
      const result = await perform(() => actions.returnHome());
      return { success: result.ok };
    }

    case 'PROCESS': {
      const result = await perform(() =>
        actions.process(step.fromDevice, step.durationSeconds ?? 0, step.plateId)
      );
      // Successful process steps are not transfers and leave no record
      return result.ok ? { success: true } : { success: false, record: toRecord(result) };
    }

    case 'PICK_AND_MOVE_AND_PLACE': {
      const operations: Array<() => TransitionResult> = [];
      const source = getDevice(store.getState().workcell, step.fromDevice);

      if (!samePosition(store.getState().workcell.robot.currentPosition, source.position)) {
        operations.push(() => actions.moveTo(step.fromDevice));
      }
      operations.push(
        () => actions.pick(step.fromDevice, step.plateId),
        () => actions.moveTo(step.toDevice),
        () => actions.place(step.toDevice)
      );

      for (const operation of operations) {
        const result = await perform(operation);
        if (!result.ok) {
          return { success: false, record: toRecord(result) };
        }
      }
      return { success: true, record: toRecord() };
    }
  }
}

/**
 * Run a protocol to completion or to its first failure.
 *
 * @throws ProtocolValidationError if the protocol references unknown devices or
 *   is malformed; nothing has been executed in that case
 */
export async function runProtocol(
  store: WorkcellStoreApi,
  protocol: readonly TransferStep[],
  options: RunOptions = {}
): Promise<ProtocolRunResult> {
  const opts: ResolvedOptions = {
    ...options,
    stopOnFailure: options.stopOnFailure ?? DEFAULT_OPTIONS.stopOnFailure,
    wait: options.wait ?? DEFAULT_OPTIONS.wait,
    speedMultiplier: options.speedMultiplier ?? DEFAULT_OPTIONS.speedMultiplier,
    maxWaitMs: options.maxWaitMs ?? DEFAULT_OPTIONS.maxWaitMs,
    clock: options.clock ?? DEFAULT_OPTIONS.clock,
  };

  const problems = validateProtocol(store.getState().workcell, protocol);
  if (problems.length > 0) {
    throw new ProtocolValidationError(problems);
  }

  const startedAt = opts.clock();
  const startElapsed = store.getState().workcell.elapsedMs;
  const startMoves = store.getState().workcell.robot.movesCount;
  const startDistance = store.getState().workcell.robot.distanceTravelledMm;
  const records: TransferRecord[] = [];
  let failedStep: number | null = null;
  let stepsExecuted = 0;

  log.info(`Starting protocol: ${protocol.length} steps on "${store.getState().workcell.name}"`);

  for (let i = 0; i < protocol.length; i++) {
    const step = protocol[i];
    opts.onStepStart?.(i, step);
    log.info(`Step ${i + 1}/${protocol.length}: ${step.label ?? step.action}`);

    const outcome = await executeStep(store, step, i, opts);
    stepsExecuted++;

    if (outcome.record) {
      records.push(outcome.record);
      store.getState().appendRecord(outcome.record);
    }

    opts.onStepComplete?.(i, step, outcome.success, store);

    if (!outcome.success) {
      if (failedStep === null) failedStep = i;
      log.error(`Step ${i + 1} failed: ${outcome.record?.errorReason ?? 'operation rejected'}`);
      if (opts.stopOnFailure) {
        log.warn(`Aborting protocol; ${protocol.length - i - 1} steps not executed`);
        break;
      }
    }
  }

  const finalState = store.getState().workcell;
  const successfulTransfers = records.filter(r => r.success).length;
  const summary: ProtocolSummary = {
    startedAt,
    finishedAt: opts.clock(),
    simulatedMs: finalState.elapsedMs - startElapsed,
    robotMoves: finalState.robot.movesCount - startMoves,
    distanceTravelledMm: finalState.robot.distanceTravelledMm - startDistance,
    totalTransfers: records.length,
    successfulTransfers,
    failedTransfers: records.length - successfulTransfers,
    successRate: records.length > 0 ? (successfulTransfers / records.length) * 100 : 0,
  };

  const completed = failedStep === null && stepsExecuted === protocol.length;
  if (completed) {
    log.info(`Protocol complete: ${successfulTransfers} transfers in ${(summary.simulatedMs / 1000).toFixed(1)}s simulated`);
  }

  return { records, completed, failedStep, stepsExecuted, finalState, summary };
}
