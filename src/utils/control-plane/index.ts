import { type CommandRunner, runCommand } from "../command-runner.js";
import { clusterOperations } from "./cluster-operations.js";
import type {
  ClusterControlPlane,
  ControlPlaneContext,
} from "./control-plane-types.js";
import { resourceOperations } from "./resource-operations.js";

/**
 * Control plane driven through the minikube CLI and its bundled kubectl
 */
export class MinikubeControlPlane
  implements ClusterControlPlane, ControlPlaneContext
{
  public clusterName: string;
  public run: CommandRunner;

  // Mix in the operations
  public createCluster: typeof clusterOperations.createCluster;
  public deleteCluster: typeof clusterOperations.deleteCluster;
  public clusterStatus: typeof clusterOperations.clusterStatus;
  public loadImage: typeof clusterOperations.loadImage;

  public apply: typeof resourceOperations.apply;
  public get: typeof resourceOperations.get;
  public delete: typeof resourceOperations.delete;
  public exec: typeof resourceOperations.exec;
  public logs: typeof resourceOperations.logs;

  constructor(clusterName: string, run: CommandRunner = runCommand) {
    this.clusterName = clusterName;
    this.run = run;

    // Bind cluster operations
    this.createCluster = clusterOperations.createCluster.bind(this);
    this.deleteCluster = clusterOperations.deleteCluster.bind(this);
    this.clusterStatus = clusterOperations.clusterStatus.bind(this);
    this.loadImage = clusterOperations.loadImage.bind(this);

    // Bind resource operations
    this.apply = resourceOperations.apply.bind(this);
    this.get = resourceOperations.get.bind(this);
    this.delete = resourceOperations.delete.bind(this);
    this.exec = resourceOperations.exec.bind(this);
    this.logs = resourceOperations.logs.bind(this);
  }
}

export { DockerImageTool } from "./image-operations.js";
export type {
  BuildRequest,
  ClusterControlPlane,
  ClusterOptions,
  GetOptions,
  ImageTool,
  LogOptions,
} from "./control-plane-types.js";
