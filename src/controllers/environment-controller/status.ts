import { ControlPlaneError, LogCollectionFailure, type Result } from "../../models/errors.js";
import type { Environment, NetworkDevice } from "../../models/types.js";
import type {
  DeviceStatusSummary,
  EnvironmentControllerContext,
  EnvironmentStatus,
} from "./controller-types.js";
import { guard, runPhase } from "./environment.js";

const LIVE_PHASES = [
  "Uninitialized",
  "ClusterReady",
  "ImagesReady",
  "DependencyReady",
  "ControllerReady",
  "Steady",
  "TearingDown",
] as const;

export function summarizeDevice(device: NetworkDevice): DeviceStatusSummary {
  return {
    name: device.metadata.name,
    operation: device.spec.operation,
    operationAction: device.spec.operationAction,
    operationState: device.status?.operationState,
    lastTransitionTime: device.status?.lastTransitionTime,
  };
}

/**
 * Cluster state, pods and NetworkDevice status. Pods and devices are only
 * queried while the cluster runs.
 */
export async function status(
  this: EnvironmentControllerContext,
  env: Environment,
): Promise<Result<EnvironmentStatus>> {
  const allowed = guard(env, "status", LIVE_PHASES);
  if (!allowed.ok) return allowed;

  return runPhase(
    "status",
    (error) => new ControlPlaneError("status", { cause: error }),
    async () => {
      const cluster = await this.controlPlane.clusterStatus(env.clusterName);
      const report: EnvironmentStatus = {
        clusterName: env.clusterName,
        clusterRunning: cluster.ok,
        clusterDetail: (cluster.ok ? cluster.stdout : cluster.stderr || cluster.stdout).trim(),
        pods: [],
        devices: [],
      };
      if (!cluster.ok) {
        return report;
      }

      report.pods = await this.deviceClient.listPods();
      const devices = await this.deviceClient.listNetworkDevices();
      report.devices = devices.items.map(summarizeDevice);
      return report;
    },
  );
}

/**
 * Snapshot every pod's logs for a test run and return the directory
 */
export async function collectLogs(
  this: EnvironmentControllerContext,
  env: Environment,
  testName: string,
): Promise<Result<string>> {
  const allowed = guard(env, "collectLogs", LIVE_PHASES);
  if (!allowed.ok) return allowed;

  return runPhase(
    "collectLogs",
    (error, detail) => new LogCollectionFailure(testName, detail, { cause: error }),
    () => this.logCollector.collect(testName),
  );
}
