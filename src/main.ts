import { createInterface } from 'node:readline/promises'
import { CELL_SCREENING_PROTOCOL, MOTION } from './config/workcell'
import { getRuntimeConfig, validateEnvConfig } from './lib/config'
import { configureLogger, loggers } from './lib/logger'
import {
  describeEvent,
  formatDeviceStatus,
  formatPosition,
  formatProtocolLog,
  formatRunSummary,
  listDevices,
  rule,
  runProtocol,
} from './lib/workcell'
import { createScreeningWorkcell } from './stores/workcellStore'

const log = loggers.cli;

function print(lines: string[]): void {
  for (const line of lines) console.log(line);
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

async function main(): Promise<number> {
  // Validate environment configuration at startup
  const envValidation = validateEnvConfig();
  if (envValidation.errors.length > 0) {
    log.error('Environment configuration errors', envValidation.errors);
    return 1;
  }
  envValidation.warnings.forEach(warning => {
    log.warn(warning);
  });

  const runtime = getRuntimeConfig();
  if (runtime.logLevel) configureLogger({ minLevel: runtime.logLevel });

  const store = createScreeningWorkcell();
  const { workcell } = store.getState();

  print([rule(), 'ROBOT WORKCELL SIMULATOR', `Workcell: ${workcell.name}`, rule()]);
  for (const device of listDevices(workcell)) {
    console.log(`  ${device.name.padEnd(15)} ${formatPosition(device.position).padEnd(32)} ${device.purpose}`);
  }
  console.log(`  Robot position: ${formatPosition(workcell.robot.currentPosition)}`);

  if (process.stdin.isTTY) {
    const rl = createInterface({ input: process.stdin, output: process.stdout });
    try {
      await rl.question('\nPress Enter to start automated protocol...');
    } finally {
      rl.close();
    }
  }

  const result = await runProtocol(store, CELL_SCREENING_PROTOCOL, {
    wait: runtime.skipWait ? () => Promise.resolve() : sleep,
    speedMultiplier: runtime.speedMultiplier,
    maxWaitMs: MOTION.MAX_REAL_WAIT_MS,
    onStepStart: (i, step) => {
      print(['', rule(), `STEP ${i + 1}: ${step.label ?? step.action}`, rule()]);
    },
    onEvent: event => console.log(`  ${describeEvent(event)}`),
  });

  print(['', rule(), result.completed ? 'PROTOCOL COMPLETE' : 'PROTOCOL ABORTED', rule()]);
  print(formatRunSummary(result.summary));
  print(formatProtocolLog(result.records));
  print(formatDeviceStatus(listDevices(result.finalState)));

  return result.completed ? 0 : 2;
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    log.error('Simulator crashed', err);
    process.exitCode = 1;
  });
