import { type EnvironmentConfig, POLL_POLICIES } from "../../config.js";
import type { Environment, LifecyclePhase, NetworkDevice, NetworkDeviceSpec } from "../../models/types.js";
import { DeploymentOrchestrator } from "../../services/deployment-orchestrator.js";
import { ImageBuilder } from "../../services/image-builder.js";
import { LogCollector } from "../../services/log-collector.js";
import { ResourceRegistry } from "../../services/resource-registry.js";
import {
  type ClusterControlPlane,
  DockerImageTool,
  type ImageTool,
  MinikubeControlPlane,
} from "../../utils/control-plane/index.js";
import { type DeviceClient, KubernetesClient } from "../../utils/k8s-client/index.js";
import { type Clock, type PollPolicy, systemClock } from "../../utils/poll.js";
import { setupCluster } from "./cluster-lifecycle.js";
import type { EnvironmentControllerContext } from "./controller-types.js";
import { buildImages, deployController, deployDependency } from "./deployment-phases.js";
import {
  adoptDevices,
  awaitControllerLog,
  awaitDeviceState,
  createDevice,
  deleteDevice,
} from "./device-management.js";
import { createEnvironment } from "./environment.js";
import { collectLogs, status } from "./status.js";
import { finishSession, teardown } from "./teardown.js";

export interface EnvironmentControllerDeps {
  controlPlane: ClusterControlPlane;
  imageTool: ImageTool;
  deviceClient: DeviceClient;
  clock?: Clock;
  policies?: Partial<typeof POLL_POLICIES>;
  /** Time source for log directory names */
  now?: () => Date;
}

/**
 * Drives an Environment through its lifecycle. Every operation takes the
 * current Environment and resolves to a Result holding the next one.
 */
export class EnvironmentController implements EnvironmentControllerContext {
  public config: EnvironmentConfig;
  public controlPlane: ClusterControlPlane;
  public imageBuilder: ImageBuilder;
  public orchestrator: DeploymentOrchestrator;
  public registry: ResourceRegistry;
  public logCollector: LogCollector;
  public deviceClient: DeviceClient;
  public clock: Clock;
  public policies: typeof POLL_POLICIES;

  constructor(config: EnvironmentConfig, deps: EnvironmentControllerDeps) {
    this.config = config;
    this.controlPlane = deps.controlPlane;
    this.deviceClient = deps.deviceClient;
    this.clock = deps.clock ?? systemClock;
    this.policies = { ...POLL_POLICIES, ...deps.policies };

    this.imageBuilder = new ImageBuilder(deps.imageTool, config.controllerSourceDir);
    this.orchestrator = new DeploymentOrchestrator(this.controlPlane, {
      namespace: config.namespace,
      clock: this.clock,
      policies: this.policies,
    });
    this.registry = new ResourceRegistry(this.controlPlane, config.namespace);
    this.logCollector = new LogCollector(this.controlPlane, config.logDir, deps.now);
  }

  // Session state
  createEnvironment(): Environment {
    return createEnvironment(this.config);
  }

  /** Resume a session whose cluster an earlier process set up */
  attach(phase: LifecyclePhase): Environment {
    return createEnvironment(this.config, phase);
  }

  // Setup phases
  async setupCluster(env: Environment) {
    return setupCluster.call(this, env);
  }

  async buildImages(env: Environment, skipIfExists?: boolean) {
    return buildImages.call(this, env, skipIfExists);
  }

  async deployDependency(env: Environment) {
    return deployDependency.call(this, env);
  }

  async deployController(env: Environment) {
    return deployController.call(this, env);
  }

  // Devices
  async createDevice(
    env: Environment,
    name: string,
    overrides?: Partial<NetworkDeviceSpec>,
  ) {
    return createDevice.call(this, env, name, overrides);
  }

  async deleteDevice(env: Environment, name: string) {
    return deleteDevice.call(this, env, name);
  }

  async awaitDeviceState(
    env: Environment,
    name: string,
    predicate: (device: NetworkDevice) => boolean,
    policy?: PollPolicy,
  ) {
    return awaitDeviceState.call(this, env, name, predicate, policy);
  }

  async awaitControllerLog(env: Environment, marker: string, policy?: PollPolicy) {
    return awaitControllerLog.call(this, env, marker, policy);
  }

  async adoptDevices(env: Environment) {
    return adoptDevices.call(this, env);
  }

  // Observation
  async status(env: Environment) {
    return status.call(this, env);
  }

  async collectLogs(env: Environment, testName: string) {
    return collectLogs.call(this, env, testName);
  }

  // Teardown
  async teardown(env: Environment) {
    return teardown.call(this, env);
  }

  async finishSession(env: Environment) {
    return finishSession.call(this, env);
  }
}

/**
 * Controller wired to minikube, docker and the cluster's kubeconfig context
 */
export function createEnvironmentController(
  config: EnvironmentConfig,
): EnvironmentController {
  return new EnvironmentController(config, {
    controlPlane: new MinikubeControlPlane(config.clusterName),
    imageTool: new DockerImageTool(),
    deviceClient: new KubernetesClient(config.namespace, config.clusterName),
  });
}

export type {
  DeviceStatusSummary,
  EnvironmentStatus,
  TeardownReport,
} from "./controller-types.js";
export { workflowMarkers } from "./device-management.js";
export { createEnvironment, PHASE_ORDER } from "./environment.js";
