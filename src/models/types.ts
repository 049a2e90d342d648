// Custom Resource Definitions

export const NETWORK_DEVICE_GROUP = "sonic.k8s.io";
export const NETWORK_DEVICE_VERSION = "v1";
export const NETWORK_DEVICE_PLURAL = "networkdevices";
export const NETWORK_DEVICE_KIND = "NetworkDevice";

// NetworkDevice represents a switch managed by the controller under test
export interface NetworkDevice {
  apiVersion: string;
  kind: string;
  metadata: {
    name: string;
    namespace?: string;
    [key: string]: unknown;
  };
  spec: NetworkDeviceSpec;
  status?: NetworkDeviceStatus;
}

// Specification for NetworkDevice
export interface NetworkDeviceSpec {
  type: string;
  osVersion: string;
  firmwareProfile: string;
  operation: string;
  operationAction: string;
}

// Status of NetworkDevice, written by the controller
export interface NetworkDeviceStatus {
  operationState?: string;
  lastTransitionTime?: string;
  [key: string]: unknown;
}

// List of NetworkDevices
export interface NetworkDeviceList {
  apiVersion?: string;
  kind?: string;
  metadata?: {
    continue?: string;
    resourceVersion?: string;
  };
  items: NetworkDevice[];
}

// Session state

export type LifecyclePhase =
  | "Uninitialized"
  | "ClusterReady"
  | "ImagesReady"
  | "DependencyReady"
  | "ControllerReady"
  | "Steady"
  | "TearingDown"
  | "Destroyed";

// Identity of a custom resource created during a session
export interface ResourceHandle {
  kind: string;
  namespace: string;
  name: string;
}

export interface ImageSet {
  /** Controller image */
  primary: string;
  /** Protocol-helper sidecar image */
  helper: string;
}

export interface Environment {
  readonly clusterName: string;
  readonly namespace: string;
  readonly images: ImageSet;
  readonly devices: readonly ResourceHandle[];
  readonly phase: LifecyclePhase;
  /** Keep the cluster alive when the session finishes */
  readonly reuse: boolean;
  /** Controller runs in simulation mode, without real transfers */
  readonly dryRun: boolean;
}

// Control plane outcomes

export interface CommandOutcome {
  ok: boolean;
  stdout: string;
  stderr: string;
}

export interface LogSnapshot {
  pod: string;
  namespace: string;
  capturedAt: string;
  file: string;
}

export interface SyntheticFile {
  name: string;
  content: string;
  size: number;
}

// Non-fatal problem recorded during cleanup
export interface CleanupWarning {
  kind: "CleanupWarning";
  target: string;
  message: string;
}
