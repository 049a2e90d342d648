import { CONTROLLER_MARKERS } from "../../config.js";
import {
  ControlPlaneError,
  type Result,
  ResourceCreationFailure,
  ResourceDeletionFailure,
} from "../../models/errors.js";
import {
  NETWORK_DEVICE_KIND,
  type Environment,
  type NetworkDevice,
  type NetworkDeviceSpec,
} from "../../models/types.js";
import { CONTROLLER_NAME } from "../../services/workloads.js";
import logger from "../../utils/logger.js";
import { awaitCondition, type PollPolicy } from "../../utils/poll.js";
import type { EnvironmentControllerContext } from "./controller-types.js";
import { advance, guard, runPhase } from "./environment.js";

const DEVICE_PHASES = ["ControllerReady", "Steady"] as const;

// Recent controller log lines searched for a workflow marker
const WORKFLOW_LOG_TAIL = 200;

/**
 * Log lines the controller writes while handling a device operation, in the
 * order it writes them.
 */
export function workflowMarkers(operationAction: string): string[] {
  const markers: string[] = [
    CONTROLLER_MARKERS.deviceAdded,
    CONTROLLER_MARKERS.workflowStarted,
  ];
  if (operationAction === "PreloadImage") {
    markers.push(CONTROLLER_MARKERS.preloadCompleted);
  }
  return markers;
}

function withDevices(
  this: EnvironmentControllerContext,
  env: Environment,
): Environment {
  return { ...advance(env, "Steady"), devices: this.registry.handles() };
}

export async function createDevice(
  this: EnvironmentControllerContext,
  env: Environment,
  name: string,
  overrides: Partial<NetworkDeviceSpec> = {},
): Promise<Result<Environment>> {
  const allowed = guard(env, "createDevice", DEVICE_PHASES);
  if (!allowed.ok) return allowed;

  return runPhase(
    "createDevice",
    (error, detail) => new ResourceCreationFailure(name, detail, { cause: error }),
    async () => {
      await this.registry.create(name, overrides);
      return withDevices.call(this, env);
    },
  );
}

export async function deleteDevice(
  this: EnvironmentControllerContext,
  env: Environment,
  name: string,
): Promise<Result<Environment>> {
  const allowed = guard(env, "deleteDevice", DEVICE_PHASES);
  if (!allowed.ok) return allowed;

  return runPhase(
    "deleteDevice",
    (error, detail) => new ResourceDeletionFailure(name, detail, { cause: error }),
    async () => {
      await this.registry.delete(name);
      return withDevices.call(this, env);
    },
  );
}

/**
 * Poll a device until `predicate` holds for it. A device that does not exist
 * yet counts as a miss.
 */
export async function awaitDeviceState(
  this: EnvironmentControllerContext,
  env: Environment,
  name: string,
  predicate: (device: NetworkDevice) => boolean,
  policy: PollPolicy = this.policies.deviceState,
): Promise<Result<NetworkDevice>> {
  const allowed = guard(env, "awaitDeviceState", DEVICE_PHASES);
  if (!allowed.ok) return allowed;

  return runPhase(
    "awaitDeviceState",
    (error) => new ControlPlaneError(`get networkdevice ${name}`, { cause: error }),
    async () => {
      logger.info(`Waiting for NetworkDevice ${name}...`);
      const { observation, attempts } = await awaitCondition(
        () => this.deviceClient.getNetworkDevice(name),
        (device) => device !== null && predicate(device),
        policy,
        this.clock,
      );
      if (!observation) {
        throw new ControlPlaneError(`get networkdevice ${name}`, {
          cause: new Error("device not found"),
        });
      }
      logger.info(
        `NetworkDevice ${name} reached the expected state after ${attempts} attempt(s)`,
      );
      return observation;
    },
  );
}

/**
 * Poll the controller's recent logs until they contain `marker`. Resolves to
 * the log text that held it.
 */
export async function awaitControllerLog(
  this: EnvironmentControllerContext,
  env: Environment,
  marker: string,
  policy: PollPolicy = this.policies.deviceState,
): Promise<Result<string>> {
  const allowed = guard(env, "awaitControllerLog", DEVICE_PHASES);
  if (!allowed.ok) return allowed;

  const resource = `daemonset/${CONTROLLER_NAME}`;
  return runPhase(
    "awaitControllerLog",
    (error) => new ControlPlaneError(`logs ${resource}`, { cause: error }),
    async () => {
      logger.info(`Waiting for controller log line "${marker}"...`);
      const { observation } = await awaitCondition(
        () =>
          this.controlPlane.logs(resource, {
            namespace: env.namespace,
            tail: WORKFLOW_LOG_TAIL,
          }),
        (outcome) => outcome.ok && outcome.stdout.includes(marker),
        policy,
        this.clock,
      );
      return observation.stdout;
    },
  );
}

/**
 * Register the NetworkDevices already present in the namespace so that
 * cleanup reaches devices created by an earlier process.
 */
export async function adoptDevices(
  this: EnvironmentControllerContext,
  env: Environment,
): Promise<Result<Environment>> {
  const allowed = guard(env, "adoptDevices", [
    "ControllerReady",
    "Steady",
    "TearingDown",
  ]);
  if (!allowed.ok) return allowed;

  return runPhase(
    "adoptDevices",
    (error) => new ControlPlaneError("list networkdevices", { cause: error }),
    async () => {
      const list = await this.deviceClient.listNetworkDevices();
      for (const device of list.items) {
        this.registry.adopt({
          kind: NETWORK_DEVICE_KIND,
          namespace: device.metadata.namespace ?? env.namespace,
          name: device.metadata.name,
        });
      }
      logger.info(`Adopted ${list.items.length} existing NetworkDevice(s)`);
      return { ...env, devices: this.registry.handles() };
    },
  );
}
