import path from "path";
import type { EnvironmentConfig } from "../config.js";

export interface WorkloadSpec {
  /** Name used in logs and errors */
  name: string;
  /** kubectl resource reference, e.g. deployment/redis */
  resource: string;
  /** Label selector matching the workload's pods */
  selector: string;
  templatePath: string;
  /** Image reference in the template replaced by `image` */
  imagePlaceholder?: string;
  image?: string;
  /** Environment variables set on one container after templating */
  containerEnv?: {
    container: string;
    values: Record<string, string>;
  };
}

export interface DependencyWorkload extends WorkloadSpec {
  /** Commands run inside the workload once its pods are up */
  configCommands(nodeAddress: string): string[];
}

export interface ControllerWorkload extends WorkloadSpec {
  crdPath: string;
  crdName: string;
  rbacPath: string;
  /** Log line that proves the controller finished initialising */
  readyMarker: string;
  /** How many recent log lines to search for the marker */
  logTail: number;
}

export const CONTROLLER_NAME = "sonic-change-agent";
export const CONTROLLER_IMAGE_PLACEHOLDER = "sonic-change-agent:latest";

export function redisWorkload(manifestsDir: string): DependencyWorkload {
  return {
    name: "redis",
    resource: "deployment/redis",
    selector: "app=redis",
    templatePath: path.join(manifestsDir, "redis.yaml"),
    // CONFIG_DB lives in database 4
    configCommands: (nodeAddress) => [
      `redis-cli -n 4 HSET 'KUBERNETES_MASTER|SERVER' ip '${nodeAddress}' port '8443' insecure 'False' disable 'False'`,
      "redis-cli -n 4 HSET 'GNMI|gnmi' port '8080' client_auth 'false'",
    ],
  };
}

export function controllerWorkload(
  config: Pick<EnvironmentConfig, "manifestsDir">,
  image: string,
  dryRun: boolean,
  readyMarker: string,
): ControllerWorkload {
  return {
    name: CONTROLLER_NAME,
    resource: `daemonset/${CONTROLLER_NAME}`,
    selector: `app=${CONTROLLER_NAME}`,
    templatePath: path.join(config.manifestsDir, "daemonset.yaml"),
    imagePlaceholder: CONTROLLER_IMAGE_PLACEHOLDER,
    image,
    containerEnv: {
      container: CONTROLLER_NAME,
      values: { DRY_RUN: dryRun ? "true" : "false" },
    },
    crdPath: path.join(config.manifestsDir, "crd.yaml"),
    crdName: "networkdevices.sonic.k8s.io",
    rbacPath: path.join(config.manifestsDir, "rbac.yaml"),
    readyMarker,
    logTail: 20,
  };
}
