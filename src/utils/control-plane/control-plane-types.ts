import type { CommandOutcome } from "../../models/types.js";
import type { CommandRunner } from "../command-runner.js";

export interface ClusterOptions {
  driver: string;
  kubernetesVersion: string;
}

export interface GetOptions {
  namespace?: string;
  /** Label selector, e.g. app=redis */
  selector?: string;
  /** kubectl output format: json, wide, jsonpath=... */
  output?: string;
  allNamespaces?: boolean;
}

export interface LogOptions {
  namespace?: string;
  tail?: number;
  allContainers?: boolean;
}

export interface BuildRequest {
  dockerfile: string;
  tag: string;
  context: string;
}

/**
 * Cluster and generic resource operations. Outcomes are opaque text plus a
 * success flag; callers only do substring or field checks on them.
 */
export interface ClusterControlPlane {
  createCluster(name: string, options: ClusterOptions): Promise<CommandOutcome>;
  deleteCluster(name: string): Promise<CommandOutcome>;
  clusterStatus(name: string): Promise<CommandOutcome>;
  apply(manifestPath: string, namespace?: string): Promise<CommandOutcome>;
  get(kind: string, name?: string, options?: GetOptions): Promise<CommandOutcome>;
  delete(kind: string, name: string, namespace?: string): Promise<CommandOutcome>;
  exec(resource: string, command: string[], namespace?: string): Promise<CommandOutcome>;
  logs(resource: string, options?: LogOptions): Promise<CommandOutcome>;
  loadImage(image: string): Promise<CommandOutcome>;
}

/**
 * Local container image store.
 */
export interface ImageTool {
  imageExists(image: string): Promise<boolean>;
  build(request: BuildRequest): Promise<CommandOutcome>;
  removeImage(image: string): Promise<CommandOutcome>;
}

// Interface for the control plane context (used as 'this')
export interface ControlPlaneContext {
  clusterName: string;
  run: CommandRunner;
}
