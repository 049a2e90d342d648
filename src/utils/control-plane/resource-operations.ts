import type { CommandOutcome } from "../../models/types.js";
import type {
  ControlPlaneContext,
  GetOptions,
  LogOptions,
} from "./control-plane-types.js";

function kubectl(
  context: ControlPlaneContext,
  args: string[],
): Promise<CommandOutcome> {
  return context.run("minikube", [
    "kubectl",
    "--profile",
    context.clusterName,
    "--",
    ...args,
  ]);
}

function namespaceArgs(namespace?: string): string[] {
  return namespace ? ["-n", namespace] : [];
}

export const resourceOperations = {
  async apply(
    this: ControlPlaneContext,
    manifestPath: string,
    namespace?: string,
  ): Promise<CommandOutcome> {
    return kubectl(this, [
      "apply",
      "-f",
      manifestPath,
      ...namespaceArgs(namespace),
    ]);
  },

  async get(
    this: ControlPlaneContext,
    kind: string,
    name?: string,
    options: GetOptions = {},
  ): Promise<CommandOutcome> {
    const args = ["get", kind];
    if (name) args.push(name);
    if (options.allNamespaces) {
      args.push("--all-namespaces");
    } else {
      args.push(...namespaceArgs(options.namespace));
    }
    if (options.selector) args.push("-l", options.selector);
    if (options.output) args.push("-o", options.output);
    return kubectl(this, args);
  },

  async delete(
    this: ControlPlaneContext,
    kind: string,
    name: string,
    namespace?: string,
  ): Promise<CommandOutcome> {
    return kubectl(this, [
      "delete",
      kind,
      name,
      ...namespaceArgs(namespace),
      "--ignore-not-found=true",
    ]);
  },

  async exec(
    this: ControlPlaneContext,
    resource: string,
    command: string[],
    namespace?: string,
  ): Promise<CommandOutcome> {
    return kubectl(this, [
      "exec",
      resource,
      ...namespaceArgs(namespace),
      "--",
      ...command,
    ]);
  },

  async logs(
    this: ControlPlaneContext,
    resource: string,
    options: LogOptions = {},
  ): Promise<CommandOutcome> {
    const args = ["logs", resource, ...namespaceArgs(options.namespace)];
    if (options.tail !== undefined) args.push(`--tail=${options.tail}`);
    if (options.allContainers) args.push("--all-containers=true");
    return kubectl(this, args);
  },
};
