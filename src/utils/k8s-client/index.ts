import * as k8s from "@kubernetes/client-node";
import { customResourceOperations } from "./custom-resource-operations.js";
import type { DeviceClient, K8sClientContext } from "./k8s-client-types.js";
import { podOperations } from "./pod-operations.js";

/**
 * Kubernetes client wrapper for reading NetworkDevices and pods
 */
export class KubernetesClient implements K8sClientContext, DeviceClient {
  public k8sApi: k8s.CoreV1Api;
  public customApi: k8s.CustomObjectsApi;
  public namespace: string;

  // Mix in the operations
  public listPods: typeof podOperations.listPods;

  public getNetworkDevice: typeof customResourceOperations.getNetworkDevice;
  public listNetworkDevices: typeof customResourceOperations.listNetworkDevices;

  /**
   * @param context - kubeconfig context to use; minikube names it after the
   * profile. Falls back to the current context when absent.
   */
  constructor(namespace: string = "default", context?: string) {
    const kc = new k8s.KubeConfig();
    kc.loadFromDefault();
    if (context && kc.getContexts().some((c) => c.name === context)) {
      kc.setCurrentContext(context);
    }

    this.k8sApi = kc.makeApiClient(k8s.CoreV1Api);
    this.customApi = kc.makeApiClient(k8s.CustomObjectsApi);
    this.namespace = namespace;

    this.listPods = podOperations.listPods.bind(this);

    // Bind custom resource operations
    this.getNetworkDevice =
      customResourceOperations.getNetworkDevice.bind(this);
    this.listNetworkDevices =
      customResourceOperations.listNetworkDevices.bind(this);
  }
}

export type { DeviceClient, PodSummary } from "./k8s-client-types.js";
