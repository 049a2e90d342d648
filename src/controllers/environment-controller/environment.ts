import type { EnvironmentConfig } from "../../config.js";
import {
  describeError,
  EnvironmentError,
  Failure,
  InvalidTransition,
  type Result,
  Success,
} from "../../models/errors.js";
import type { Environment, LifecyclePhase } from "../../models/types.js";
import logger from "../../utils/logger.js";

export const PHASE_ORDER: readonly LifecyclePhase[] = [
  "Uninitialized",
  "ClusterReady",
  "ImagesReady",
  "DependencyReady",
  "ControllerReady",
  "Steady",
  "TearingDown",
  "Destroyed",
];

/**
 * Fresh session state, or state for a cluster set up by an earlier process
 * when `phase` is given.
 */
export function createEnvironment(
  config: EnvironmentConfig,
  phase: LifecyclePhase = "Uninitialized",
): Environment {
  return {
    clusterName: config.clusterName,
    namespace: config.namespace,
    images: { ...config.images },
    devices: [],
    phase,
    reuse: config.reuse,
    dryRun: config.dryRun,
  };
}

export function guard(
  env: Environment,
  operation: string,
  allowed: readonly LifecyclePhase[],
): Result<Environment> {
  if (!allowed.includes(env.phase)) {
    return Failure(new InvalidTransition(operation, env.phase));
  }
  return Success(env);
}

/**
 * Move forward to `phase`; a target behind the current phase keeps the
 * current one.
 */
export function advance(env: Environment, phase: LifecyclePhase): Environment {
  if (PHASE_ORDER.indexOf(phase) <= PHASE_ORDER.indexOf(env.phase)) {
    return env;
  }
  return { ...env, phase };
}

/**
 * Run one phase body and turn whatever it throws into a failed Result.
 * Errors outside the taxonomy are wrapped by `wrap`, which receives the
 * rendered error as detail text.
 */
export async function runPhase<T>(
  operation: string,
  wrap: (error: unknown, detail: string) => EnvironmentError,
  body: () => Promise<T>,
): Promise<Result<T>> {
  try {
    return Success(await body());
  } catch (error) {
    const failure = error instanceof EnvironmentError ? error : wrap(error, describeError(error));
    logger.error(`${operation} failed: ${failure.message}`);
    return Failure(failure);
  }
}
