import type { CommandOutcome } from "../../models/types.js";
import type { ClusterOptions, ControlPlaneContext } from "./control-plane-types.js";

export const clusterOperations = {
  /**
   * Start a minikube profile
   */
  async createCluster(
    this: ControlPlaneContext,
    name: string,
    options: ClusterOptions,
  ): Promise<CommandOutcome> {
    return this.run("minikube", [
      "start",
      "--profile",
      name,
      `--driver=${options.driver}`,
      `--kubernetes-version=${options.kubernetesVersion}`,
    ]);
  },

  /**
   * Delete a minikube profile
   */
  async deleteCluster(
    this: ControlPlaneContext,
    name: string,
  ): Promise<CommandOutcome> {
    return this.run("minikube", ["delete", "--profile", name]);
  },

  async clusterStatus(
    this: ControlPlaneContext,
    name: string,
  ): Promise<CommandOutcome> {
    return this.run("minikube", ["status", "--profile", name]);
  },

  /**
   * Copy a local image into the cluster's container runtime
   */
  async loadImage(
    this: ControlPlaneContext,
    image: string,
  ): Promise<CommandOutcome> {
    return this.run("minikube", [
      "image",
      "load",
      image,
      "--profile",
      this.clusterName,
    ]);
  },
};
