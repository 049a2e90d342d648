import {
  NETWORK_DEVICE_GROUP,
  NETWORK_DEVICE_PLURAL,
  NETWORK_DEVICE_VERSION,
  type NetworkDevice,
  type NetworkDeviceList,
} from "../../models/types.js";
import logger from "../logger.js";
import type { K8sClientContext } from "./k8s-client-types.js";

function isNotFound(error: unknown): boolean {
  if (error && typeof error === "object") {
    // Check for different 404 patterns
    const errorObj = error as {
      response?: { statusCode?: number };
      statusCode?: number;
      code?: number;
      message?: string;
    };

    return Boolean(
      (errorObj.response && errorObj.response.statusCode === 404) ||
        errorObj.statusCode === 404 ||
        errorObj.code === 404 ||
        (errorObj.message && errorObj.message.includes("not found")),
    );
  }
  return false;
}

export const customResourceOperations = {
  /**
   * Get a NetworkDevice custom resource
   */
  async getNetworkDevice(
    this: K8sClientContext,
    name: string,
  ): Promise<NetworkDevice | null> {
    try {
      const response: NetworkDevice =
        await this.customApi.getNamespacedCustomObject({
          group: NETWORK_DEVICE_GROUP,
          version: NETWORK_DEVICE_VERSION,
          namespace: this.namespace,
          plural: NETWORK_DEVICE_PLURAL,
          name,
        });
      return response;
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      logger.error(`Error retrieving NetworkDevice ${name}: ${error}`);
      throw error;
    }
  },

  /**
   * List all NetworkDevice resources in the namespace
   */
  async listNetworkDevices(
    this: K8sClientContext,
  ): Promise<NetworkDeviceList> {
    const response: NetworkDeviceList =
      await this.customApi.listNamespacedCustomObject({
        group: NETWORK_DEVICE_GROUP,
        version: NETWORK_DEVICE_VERSION,
        namespace: this.namespace,
        plural: NETWORK_DEVICE_PLURAL,
      });
    return response;
  },
};
