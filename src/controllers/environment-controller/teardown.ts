import { describeError, type Result, Success } from "../../models/errors.js";
import type { CleanupWarning, CommandOutcome, Environment } from "../../models/types.js";
import { CONTROLLER_NAME } from "../../services/workloads.js";
import logger from "../../utils/logger.js";
import type { EnvironmentControllerContext, TeardownReport } from "./controller-types.js";
import { guard, PHASE_ORDER } from "./environment.js";

const TEARDOWN_PHASES = PHASE_ORDER.filter((phase) => phase !== "Destroyed");

async function bestEffort(
  warnings: CleanupWarning[],
  target: string,
  step: () => Promise<CommandOutcome>,
): Promise<void> {
  let message: string;
  try {
    const outcome = await step();
    if (outcome.ok) return;
    message = outcome.stderr.trim();
  } catch (error) {
    message = describeError(error);
  }
  logger.warn(`Cleanup of ${target} failed: ${message}`);
  warnings.push({ kind: "CleanupWarning", target, message });
}

function reached(env: Environment, phase: Environment["phase"]): boolean {
  return PHASE_ORDER.indexOf(env.phase) >= PHASE_ORDER.indexOf(phase);
}

/**
 * Reclaim everything the session created, newest first. Each failing step is
 * reported as a warning and the remaining steps still run.
 */
export async function teardown(
  this: EnvironmentControllerContext,
  env: Environment,
): Promise<Result<TeardownReport>> {
  const allowed = guard(env, "teardown", TEARDOWN_PHASES);
  if (!allowed.ok) return allowed;

  const tearingDown: Environment = { ...env, phase: "TearingDown" };
  logger.info(`Tearing down environment ${tearingDown.clusterName}...`);

  const warnings: CleanupWarning[] = [];
  warnings.push(...(await this.registry.cleanupAll()));

  if (reached(env, "ClusterReady")) {
    await bestEffort(warnings, `daemonset/${CONTROLLER_NAME}`, () =>
      this.controlPlane.delete("daemonset", CONTROLLER_NAME, env.namespace),
    );
    await bestEffort(warnings, "deployment/redis", () =>
      this.controlPlane.delete("deployment", "redis", env.namespace),
    );
  }
  await bestEffort(warnings, `cluster/${env.clusterName}`, () =>
    this.controlPlane.deleteCluster(env.clusterName),
  );
  if (reached(env, "ImagesReady")) {
    await bestEffort(warnings, `image/${env.images.primary}`, () =>
      this.imageBuilder.removeImage(env.images.primary),
    );
  }

  logger.info(`Environment ${env.clusterName} destroyed (${warnings.length} warning(s))`);

  return Success({
    environment: { ...tearingDown, phase: "Destroyed", devices: [] },
    warnings,
  });
}

/**
 * End of a session: tear down unless the environment is kept for reuse.
 */
export async function finishSession(
  this: EnvironmentControllerContext,
  env: Environment,
): Promise<Result<TeardownReport>> {
  const allowed = guard(env, "finishSession", TEARDOWN_PHASES);
  if (!allowed.ok) return allowed;

  if (env.reuse) {
    logger.info(`Keeping environment ${env.clusterName} for reuse`);
    return Success({ environment: env, warnings: [] });
  }
  return teardown.call(this, env);
}
