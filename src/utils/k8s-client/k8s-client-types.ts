import type * as k8s from "@kubernetes/client-node";
import type { NetworkDevice, NetworkDeviceList } from "../../models/types.js";

// Interface for the Kubernetes client context (used as 'this')
export interface K8sClientContext {
  namespace: string;
  k8sApi: k8s.CoreV1Api;
  customApi: k8s.CustomObjectsApi;
}

/**
 * Read access to NetworkDevice resources, as used by status reporting and
 * device state polling
 */
export interface DeviceClient {
  getNetworkDevice(name: string): Promise<NetworkDevice | null>;
  listNetworkDevices(): Promise<NetworkDeviceList>;
  listPods(labelSelector?: string): Promise<PodSummary[]>;
}

export interface PodSummary {
  name: string;
  namespace: string;
  phase: string;
  ready: boolean;
}
