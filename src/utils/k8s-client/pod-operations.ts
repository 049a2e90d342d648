import logger from "../logger.js";
import type { K8sClientContext, PodSummary } from "./k8s-client-types.js";

export const podOperations = {
  /**
   * List Pods in the namespace, optionally by label selector
   */
  async listPods(
    this: K8sClientContext,
    labelSelector?: string,
  ): Promise<PodSummary[]> {
    try {
      const response = await this.k8sApi.listNamespacedPod({
        namespace: this.namespace,
        labelSelector,
      });
      return response.items.map((pod) => ({
        name: pod.metadata?.name || "<unnamed>",
        namespace: pod.metadata?.namespace || this.namespace,
        phase: pod.status?.phase || "Unknown",
        ready: (pod.status?.containerStatuses || []).every(
          (status) => status.ready,
        ),
      }));
    } catch (error) {
      logger.error(`Error in listPods: ${error}`);
      throw error;
    }
  },
};
