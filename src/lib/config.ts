/**
 * Runtime configuration read from the environment.
 */

import { isLogLevel, type LogLevel } from './logger';

export interface RuntimeConfig {
  logLevel?: LogLevel;
  /** Multiplier applied to real waits only; simulated time is unaffected */
  speedMultiplier: number;
  /** Skip real waits entirely */
  skipWait: boolean;
}

export interface EnvValidation {
  errors: string[];
  warnings: string[];
}

type Env = Record<string, string | undefined>;

export function getRuntimeConfig(env: Env = process.env): RuntimeConfig {
  const speed = Number(env.WORKCELL_SPEED);
  return {
    logLevel: isLogLevel(env.WORKCELL_LOG_LEVEL) ? env.WORKCELL_LOG_LEVEL : undefined,
    speedMultiplier: env.WORKCELL_SPEED !== undefined && Number.isFinite(speed) && speed > 0 ? speed : 1,
    skipWait: env.WORKCELL_SKIP_WAIT === 'true',
  };
}

export function validateEnvConfig(env: Env = process.env): EnvValidation {
  const result: EnvValidation = { errors: [], warnings: [] };

  if (env.WORKCELL_LOG_LEVEL !== undefined && !isLogLevel(env.WORKCELL_LOG_LEVEL)) {
    result.errors.push(
      `WORKCELL_LOG_LEVEL must be one of debug, info, warn, error (got "${env.WORKCELL_LOG_LEVEL}")`
    );
  }

  if (env.WORKCELL_SPEED !== undefined) {
    const speed = Number(env.WORKCELL_SPEED);
    if (!Number.isFinite(speed) || speed <= 0) {
      result.errors.push(`WORKCELL_SPEED must be a positive number (got "${env.WORKCELL_SPEED}")`);
    } else if (speed > 100) {
      result.warnings.push(`WORKCELL_SPEED=${speed} makes real waits shorter than 1% of simulated time`);
    }
  }

  if (env.WORKCELL_SKIP_WAIT !== undefined && env.WORKCELL_SKIP_WAIT !== 'true' && env.WORKCELL_SKIP_WAIT !== 'false') {
    result.warnings.push(`WORKCELL_SKIP_WAIT should be "true" or "false" (got "${env.WORKCELL_SKIP_WAIT}")`);
  }

  return result;
}
