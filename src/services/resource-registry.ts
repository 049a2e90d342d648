import { dumpYaml } from "@kubernetes/client-node";
import {
  describeError,
  ResourceCreationFailure,
  ResourceDeletionFailure,
} from "../models/errors.js";
import {
  NETWORK_DEVICE_GROUP,
  NETWORK_DEVICE_KIND,
  NETWORK_DEVICE_VERSION,
  type CleanupWarning,
  type CommandOutcome,
  type NetworkDevice,
  type NetworkDeviceSpec,
  type ResourceHandle,
} from "../models/types.js";
import type { ClusterControlPlane } from "../utils/control-plane/index.js";
import logger from "../utils/logger.js";
import { withManifestFile } from "../utils/manifest-file.js";

export const DEFAULT_DEVICE_SPEC: Readonly<NetworkDeviceSpec> = {
  type: "leafRouter",
  osVersion: "202505.01",
  firmwareProfile: "SONiC-Test-Profile",
  operation: "OSUpgrade",
  operationAction: "PreloadImage",
};

const DEVICE_SPEC_FIELDS = [
  "type",
  "osVersion",
  "firmwareProfile",
  "operation",
  "operationAction",
] as const satisfies readonly (keyof NetworkDeviceSpec)[];

// kubectl resource name for NetworkDevices
const DEVICE_RESOURCE = "networkdevice";

/**
 * Merge caller overrides onto the default spec. Fields the caller leaves
 * undefined keep their default.
 */
export function mergeDeviceSpec(
  overrides: Partial<NetworkDeviceSpec> = {},
): NetworkDeviceSpec {
  const spec: NetworkDeviceSpec = { ...DEFAULT_DEVICE_SPEC };
  for (const key of DEVICE_SPEC_FIELDS) {
    const value = overrides[key];
    if (value !== undefined) {
      spec[key] = value;
    }
  }
  return spec;
}

export function buildDeviceManifest(
  name: string,
  namespace: string,
  spec: NetworkDeviceSpec,
): NetworkDevice {
  return {
    apiVersion: `${NETWORK_DEVICE_GROUP}/${NETWORK_DEVICE_VERSION}`,
    kind: NETWORK_DEVICE_KIND,
    metadata: { name, namespace },
    spec,
  };
}

/**
 * Record of the NetworkDevices created during a session.
 *
 * A handle is added only after the control plane accepted the resource and
 * removed only after a successful delete.
 */
export class ResourceRegistry {
  private controlPlane: ClusterControlPlane;
  private namespace: string;
  private entries: ResourceHandle[] = [];

  constructor(controlPlane: ClusterControlPlane, namespace: string) {
    this.controlPlane = controlPlane;
    this.namespace = namespace;
  }

  /** Handles in creation order */
  handles(): readonly ResourceHandle[] {
    return [...this.entries];
  }

  has(name: string): boolean {
    return this.entries.some((handle) => handle.name === name);
  }

  async create(
    name: string,
    overrides: Partial<NetworkDeviceSpec> = {},
  ): Promise<ResourceHandle> {
    const manifest = buildDeviceManifest(
      name,
      this.namespace,
      mergeDeviceSpec(overrides),
    );

    let outcome: CommandOutcome;
    try {
      outcome = await withManifestFile(dumpYaml(manifest), (manifestPath) =>
        this.controlPlane.apply(manifestPath, this.namespace),
      );
    } catch (error) {
      throw new ResourceCreationFailure(name, describeError(error), {
        cause: error,
      });
    }
    if (!outcome.ok) {
      throw new ResourceCreationFailure(name, outcome.stderr);
    }

    const handle: ResourceHandle = {
      kind: NETWORK_DEVICE_KIND,
      namespace: this.namespace,
      name,
    };
    // Re-applying an existing device must not register it twice
    if (!this.has(name)) {
      this.entries.push(handle);
    }
    logger.info(`Created NetworkDevice: ${name}`);
    return handle;
  }

  /**
   * Track a device that already exists in the cluster
   */
  adopt(handle: ResourceHandle): void {
    if (!this.has(handle.name)) {
      this.entries.push(handle);
    }
  }

  async delete(name: string): Promise<void> {
    const handle = this.entries.find((entry) => entry.name === name);
    const namespace = handle?.namespace ?? this.namespace;

    let outcome: CommandOutcome;
    try {
      outcome = await this.controlPlane.delete(DEVICE_RESOURCE, name, namespace);
    } catch (error) {
      throw new ResourceDeletionFailure(name, describeError(error), {
        cause: error,
      });
    }
    if (!outcome.ok) {
      throw new ResourceDeletionFailure(name, outcome.stderr);
    }

    this.entries = this.entries.filter((entry) => entry.name !== name);
    logger.info(`Deleted NetworkDevice: ${name}`);
  }

  /**
   * Delete every registered device, newest first. Failures become warnings and
   * the registry is emptied either way.
   */
  async cleanupAll(): Promise<CleanupWarning[]> {
    const warnings: CleanupWarning[] = [];
    const pending = [...this.entries].reverse();

    for (const handle of pending) {
      const target = `${DEVICE_RESOURCE}/${handle.name}`;
      try {
        const outcome = await this.controlPlane.delete(
          DEVICE_RESOURCE,
          handle.name,
          handle.namespace,
        );
        if (outcome.ok) {
          logger.info(`Deleted NetworkDevice: ${handle.name}`);
        } else {
          warnings.push({ kind: "CleanupWarning", target, message: outcome.stderr });
        }
      } catch (error) {
        warnings.push({
          kind: "CleanupWarning",
          target,
          message: describeError(error),
        });
      }
    }

    for (const warning of warnings) {
      logger.warn(`Cleanup of ${warning.target} failed: ${warning.message}`);
    }
    this.entries = [];
    return warnings;
  }
}
