import type { EnvironmentConfig, POLL_POLICIES } from "../../config.js";
import type { DeploymentOrchestrator } from "../../services/deployment-orchestrator.js";
import type { ImageBuilder } from "../../services/image-builder.js";
import type { LogCollector } from "../../services/log-collector.js";
import type { ResourceRegistry } from "../../services/resource-registry.js";
import type { CleanupWarning, Environment } from "../../models/types.js";
import type { ClusterControlPlane } from "../../utils/control-plane/index.js";
import type { DeviceClient, PodSummary } from "../../utils/k8s-client/index.js";
import type { Clock } from "../../utils/poll.js";

// This interface defines the shape of the controller that will be used as 'this'
export interface EnvironmentControllerContext {
  config: EnvironmentConfig;
  controlPlane: ClusterControlPlane;
  imageBuilder: ImageBuilder;
  orchestrator: DeploymentOrchestrator;
  registry: ResourceRegistry;
  logCollector: LogCollector;
  deviceClient: DeviceClient;
  clock: Clock;
  policies: typeof POLL_POLICIES;
}

export interface TeardownReport {
  environment: Environment;
  warnings: CleanupWarning[];
}

export interface DeviceStatusSummary {
  name: string;
  operation: string;
  operationAction: string;
  operationState?: string;
  lastTransitionTime?: string;
}

export interface EnvironmentStatus {
  clusterName: string;
  clusterRunning: boolean;
  clusterDetail: string;
  pods: PodSummary[];
  devices: DeviceStatusSummary[];
}
