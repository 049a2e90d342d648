import { CONTROLLER_MARKERS } from "../../config.js";
import { DeploymentFailure, type Result, SetupFailure } from "../../models/errors.js";
import type { Environment } from "../../models/types.js";
import {
  CONTROLLER_NAME,
  controllerWorkload,
  redisWorkload,
} from "../../services/workloads.js";
import type { EnvironmentControllerContext } from "./controller-types.js";
import { advance, guard, runPhase } from "./environment.js";

/**
 * Build (or reuse) both images and load them into the cluster. Allowed again
 * once deployed, to rebuild in place.
 */
export async function buildImages(
  this: EnvironmentControllerContext,
  env: Environment,
  skipIfExists: boolean = this.config.skipBuild,
): Promise<Result<Environment>> {
  const allowed = guard(env, "buildImages", [
    "ClusterReady",
    "DependencyReady",
    "ControllerReady",
    "Steady",
  ]);
  if (!allowed.ok) return allowed;

  return runPhase(
    "buildImages",
    (error, detail) =>
      new SetupFailure("images", "Failed to prepare images", detail, { cause: error }),
    async () => {
      await this.imageBuilder.ensureImages(env.images, skipIfExists);
      await this.orchestrator.loadImages(env.images);
      return advance(env, "ImagesReady");
    },
  );
}

export async function deployDependency(
  this: EnvironmentControllerContext,
  env: Environment,
): Promise<Result<Environment>> {
  const allowed = guard(env, "deployDependency", ["ImagesReady"]);
  if (!allowed.ok) return allowed;

  const workload = redisWorkload(this.config.manifestsDir);
  return runPhase(
    "deployDependency",
    (error, detail) =>
      new DeploymentFailure(workload.name, `Failed to deploy ${workload.name}`, detail, {
        cause: error,
      }),
    async () => {
      await this.orchestrator.deployDependency(workload);
      return advance(env, "DependencyReady");
    },
  );
}

/**
 * Deploy CRD, RBAC and the controller and wait for its caches to sync.
 * Redeploying a running controller keeps the current phase.
 */
export async function deployController(
  this: EnvironmentControllerContext,
  env: Environment,
): Promise<Result<Environment>> {
  const allowed = guard(env, "deployController", [
    "DependencyReady",
    "ControllerReady",
    "Steady",
  ]);
  if (!allowed.ok) return allowed;

  const workload = controllerWorkload(
    this.config,
    env.images.primary,
    env.dryRun,
    CONTROLLER_MARKERS.cacheSynced,
  );
  return runPhase(
    "deployController",
    (error, detail) =>
      new DeploymentFailure(CONTROLLER_NAME, `Failed to deploy ${CONTROLLER_NAME}`, detail, {
        cause: error,
      }),
    async () => {
      await this.orchestrator.deployController(workload);
      return advance(env, "ControllerReady");
    },
  );
}
