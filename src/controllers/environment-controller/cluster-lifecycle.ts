import { PollTimeout, type Result, SetupFailure } from "../../models/errors.js";
import type { Environment } from "../../models/types.js";
import logger from "../../utils/logger.js";
import { awaitCondition } from "../../utils/poll.js";
import type { EnvironmentControllerContext } from "./controller-types.js";
import { advance, guard, runPhase } from "./environment.js";

/**
 * True when `kubectl get nodes` lists at least one node and every node's
 * STATUS column reads exactly "Ready" ("NotReady" does not count).
 */
export function nodesReady(table: string): boolean {
  const [header, ...rows] = table
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  if (!header) return false;

  const statusColumn = header.split(/\s+/).indexOf("STATUS");
  if (statusColumn === -1 || rows.length === 0) return false;

  return rows.every((row) => {
    const status = row.split(/\s+/)[statusColumn] ?? "";
    // Cordoned nodes read "Ready,SchedulingDisabled"
    return status.split(",")[0] === "Ready";
  });
}

async function deleteStaleProfile(
  this: EnvironmentControllerContext,
  clusterName: string,
): Promise<void> {
  logger.info(`Deleting existing cluster ${clusterName} if present...`);
  const outcome = await this.controlPlane.deleteCluster(clusterName);
  if (!outcome.ok) {
    logger.warn(
      `Could not delete existing cluster ${clusterName}: ${outcome.stderr.trim() || outcome.stdout.trim()}`,
    );
  }
}

/**
 * Create the cluster and wait for its nodes. A reusable session keeps a
 * cluster that is already running; a disposable one first deletes any profile
 * a previous run left behind.
 */
export async function setupCluster(
  this: EnvironmentControllerContext,
  env: Environment,
): Promise<Result<Environment>> {
  const allowed = guard(env, "setupCluster", ["Uninitialized"]);
  if (!allowed.ok) return allowed;

  return runPhase(
    "setupCluster",
    (error, detail) =>
      new SetupFailure("cluster", `Failed to set up cluster ${env.clusterName}`, detail, {
        cause: error,
      }),
    async () => {
      const existing = env.reuse
        ? await this.controlPlane.clusterStatus(env.clusterName)
        : null;

      if (existing?.ok) {
        logger.info(`Reusing running cluster ${env.clusterName}`);
      } else {
        if (!env.reuse) {
          await deleteStaleProfile.call(this, env.clusterName);
        }
        logger.info(`Creating cluster ${env.clusterName}...`);
        const outcome = await this.controlPlane.createCluster(env.clusterName, {
          driver: this.config.driver,
          kubernetesVersion: this.config.kubernetesVersion,
        });
        if (!outcome.ok) {
          throw new SetupFailure(
            "cluster",
            `Failed to create cluster ${env.clusterName}`,
            outcome.stderr || outcome.stdout,
          );
        }
      }

      logger.info("Waiting for cluster nodes to be ready...");
      try {
        await awaitCondition(
          () => this.controlPlane.get("nodes"),
          (outcome) => outcome.ok && nodesReady(outcome.stdout),
          this.policies.clusterReady,
          this.clock,
        );
      } catch (error) {
        if (error instanceof PollTimeout) {
          throw new SetupFailure(
            "cluster",
            `Cluster ${env.clusterName} nodes not ready after ${error.attempts} attempts`,
          );
        }
        throw error;
      }

      logger.info(`Cluster ${env.clusterName} is ready`);
      return advance(env, "ClusterReady");
    },
  );
}
