import { dumpYaml, loadAllYaml } from "@kubernetes/client-node";
import { readFile } from "fs/promises";
import { POLL_POLICIES } from "../config.js";
import {
  ConfigurationFailure,
  DeploymentFailure,
  DeploymentTimeout,
  PollTimeout,
  SetupFailure,
} from "../models/errors.js";
import type { ImageSet } from "../models/types.js";
import type { ClusterControlPlane } from "../utils/control-plane/index.js";
import logger from "../utils/logger.js";
import { withManifestFile } from "../utils/manifest-file.js";
import {
  awaitCondition,
  type Clock,
  type PollPolicy,
  systemClock,
} from "../utils/poll.js";
import type {
  ControllerWorkload,
  DependencyWorkload,
  WorkloadSpec,
} from "./workloads.js";

// Characters that may continue an image reference on either side of a match
const IMAGE_REF_CHAR = /[A-Za-z0-9._\-/:@]/;

/**
 * Replace each standalone occurrence of `placeholder` with `image`.
 *
 * Matching is literal. An occurrence that is only part of a longer image
 * reference (e.g. `agent:latest-debug` for `agent:latest`) is left as is.
 */
export function renderTemplate(
  template: string,
  placeholder: string,
  image: string,
): string {
  if (!placeholder) {
    return template;
  }

  let rendered = "";
  let from = 0;
  for (;;) {
    const index = template.indexOf(placeholder, from);
    if (index === -1) break;
    const end = index + placeholder.length;
    const before = index > 0 ? template[index - 1] : "";
    const after = end < template.length ? template[end] : "";
    const standalone =
      !IMAGE_REF_CHAR.test(before) && !IMAGE_REF_CHAR.test(after);
    rendered += template.slice(from, index) + (standalone ? image : placeholder);
    from = end;
  }
  return rendered + template.slice(from);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function podTemplateContainers(doc: unknown): Record<string, unknown>[] {
  if (!isRecord(doc) || !isRecord(doc.spec)) return [];
  const template = doc.spec.template;
  if (!isRecord(template) || !isRecord(template.spec)) return [];
  const containers = template.spec.containers;
  return Array.isArray(containers) ? containers.filter(isRecord) : [];
}

/**
 * Set environment variables on the named container of every workload document
 * in a multi-document manifest.
 */
export function setContainerEnv(
  manifest: string,
  container: string,
  values: Record<string, string>,
): string {
  const docs: unknown[] = loadAllYaml(manifest);
  for (const doc of docs) {
    for (const spec of podTemplateContainers(doc)) {
      if (spec.name !== container) continue;
      const env = Array.isArray(spec.env) ? spec.env.filter(isRecord) : [];
      for (const [name, value] of Object.entries(values)) {
        const existing = env.find((entry) => entry.name === name);
        if (existing) {
          delete existing.valueFrom;
          existing.value = value;
        } else {
          env.push({ name, value });
        }
      }
      spec.env = env;
    }
  }
  return dumpDocuments(docs);
}

// Kinds that live outside any namespace
const CLUSTER_SCOPED_KINDS = new Set([
  "ClusterRole",
  "ClusterRoleBinding",
  "CustomResourceDefinition",
  "Namespace",
]);

/**
 * Place every namespaced document of a multi-document manifest in
 * `namespace`. ServiceAccount subjects of role bindings follow, so a binding
 * keeps pointing at the account it grants.
 */
export function setNamespace(manifest: string, namespace: string): string {
  const docs: unknown[] = loadAllYaml(manifest);
  for (const doc of docs) {
    if (!isRecord(doc)) continue;
    if (!CLUSTER_SCOPED_KINDS.has(String(doc.kind))) {
      const metadata = isRecord(doc.metadata) ? doc.metadata : {};
      metadata.namespace = namespace;
      doc.metadata = metadata;
    }
    const subjects = Array.isArray(doc.subjects) ? doc.subjects.filter(isRecord) : [];
    for (const subject of subjects) {
      if (subject.kind === "ServiceAccount") {
        subject.namespace = namespace;
      }
    }
  }
  return dumpDocuments(docs);
}

function dumpDocuments(docs: unknown[]): string {
  return docs
    .filter((doc) => doc !== null && doc !== undefined)
    .map((doc) => dumpYaml(doc))
    .join("---\n");
}

export interface ReadinessObservation {
  podsRunning: boolean;
  podText: string;
  markerSeen: boolean;
  logText: string;
}

export interface OrchestratorOptions {
  namespace: string;
  clock?: Clock;
  policies?: Partial<typeof POLL_POLICIES>;
}

function describeObservation(observation: ReadinessObservation | undefined) {
  if (!observation) return "no observation";
  const parts = [`pods: ${observation.podText.trim() || "(none)"}`];
  if (observation.logText) {
    parts.push(`recent logs: ${observation.logText.trim()}`);
  }
  return parts.join("\n");
}

export class DeploymentOrchestrator {
  private controlPlane: ClusterControlPlane;
  private namespace: string;
  private clock: Clock;
  private policies: typeof POLL_POLICIES;

  constructor(controlPlane: ClusterControlPlane, options: OrchestratorOptions) {
    this.controlPlane = controlPlane;
    this.namespace = options.namespace;
    this.clock = options.clock ?? systemClock;
    this.policies = { ...POLL_POLICIES, ...options.policies };
  }

  /**
   * Template a workload's manifest: image substitution, container env, then
   * the target namespace
   */
  async renderWorkload(workload: WorkloadSpec): Promise<string> {
    const template = await readFile(workload.templatePath, "utf-8");
    let rendered = template;
    if (workload.imagePlaceholder && workload.image) {
      rendered = renderTemplate(rendered, workload.imagePlaceholder, workload.image);
    }
    if (workload.containerEnv) {
      rendered = setContainerEnv(
        rendered,
        workload.containerEnv.container,
        workload.containerEnv.values,
      );
    }
    return setNamespace(rendered, this.namespace);
  }

  /**
   * Apply rendered manifest text through a transient file
   */
  async applyRendered(workload: string, manifest: string): Promise<void> {
    const outcome = await withManifestFile(manifest, (manifestPath) =>
      this.controlPlane.apply(manifestPath, this.namespace),
    );
    if (!outcome.ok) {
      throw new DeploymentFailure(
        workload,
        `Failed to deploy ${workload}`,
        outcome.stderr,
      );
    }
  }

  /**
   * Apply a cluster-scoped manifest as it is on disk
   */
  async applyFile(workload: string, manifestPath: string): Promise<void> {
    const outcome = await this.controlPlane.apply(manifestPath);
    if (!outcome.ok) {
      throw new DeploymentFailure(
        workload,
        `Failed to deploy ${workload}`,
        outcome.stderr,
      );
    }
  }

  /**
   * Deploy the dependency, wait for its pods and configure it
   */
  async deployDependency(workload: DependencyWorkload): Promise<void> {
    logger.info(`Deploying ${workload.name}...`);
    await this.applyRendered(workload.name, await this.renderWorkload(workload));

    logger.info(`Waiting for ${workload.name} to be ready...`);
    await this.awaitReady(workload, this.policies.dependencyReady, () =>
      this.observePods(workload),
    );

    await this.configureDependency(workload);
    logger.info(`${workload.name} deployed and configured`);
  }

  /**
   * Run the dependency's configuration commands in order; the first failure
   * stops the sequence.
   */
  async configureDependency(workload: DependencyWorkload): Promise<void> {
    const nodeAddress = await this.resolveNodeAddress();
    logger.info(`Using node IP: ${nodeAddress}`);

    for (const command of workload.configCommands(nodeAddress)) {
      const outcome = await this.controlPlane.exec(
        workload.resource,
        ["sh", "-c", command],
        this.namespace,
      );
      if (!outcome.ok) {
        throw new ConfigurationFailure(command, outcome.stderr);
      }
    }
  }

  private async resolveNodeAddress(): Promise<string> {
    const outcome = await this.controlPlane.get("nodes", undefined, {
      output: "jsonpath={.items[0].status.addresses[0].address}",
    });
    const address = outcome.stdout.trim();
    if (!outcome.ok || !/^[0-9A-Za-z.:-]+$/.test(address)) {
      throw new ConfigurationFailure(
        "resolve node address",
        outcome.stderr || `unexpected address '${address}'`,
      );
    }
    return address;
  }

  /**
   * Load every image into the cluster's runtime
   */
  async loadImages(images: ImageSet): Promise<void> {
    logger.info("Loading Docker images into cluster...");
    for (const image of [images.primary, images.helper]) {
      const outcome = await this.controlPlane.loadImage(image);
      if (!outcome.ok) {
        throw new SetupFailure(
          "images",
          `Failed to load image ${image}`,
          outcome.stderr,
        );
      }
    }
  }

  /**
   * Deploy CRD, RBAC and the controller, then wait until the controller has
   * synced its caches.
   */
  async deployController(workload: ControllerWorkload): Promise<void> {
    logger.info("Deploying CRD...");
    await this.applyFile("crd", workload.crdPath);
    await this.awaitCrd(workload.crdName);

    logger.info("Deploying RBAC...");
    const rbac = await readFile(workload.rbacPath, "utf-8");
    await this.applyRendered("rbac", setNamespace(rbac, this.namespace));

    logger.info(`Deploying ${workload.name} with image ${workload.image}`);
    await this.applyRendered(workload.name, await this.renderWorkload(workload));

    logger.info(`Waiting for ${workload.name} to be ready...`);
    await this.awaitReady(workload, this.policies.controllerReady, () =>
      this.observeController(workload),
    );
    logger.info(`${workload.name} deployed and ready`);
  }

  private async awaitCrd(crdName: string): Promise<void> {
    try {
      await awaitCondition(
        () => this.controlPlane.get("crd", crdName),
        (outcome) => outcome.ok,
        this.policies.crdEstablished,
        this.clock,
      );
    } catch (error) {
      if (error instanceof PollTimeout) {
        throw new DeploymentTimeout("crd", `CRD ${crdName} not established`, error.attempts);
      }
      throw error;
    }
  }

  private async awaitReady(
    workload: WorkloadSpec,
    policy: PollPolicy,
    observe: () => Promise<ReadinessObservation>,
  ): Promise<ReadinessObservation> {
    let last: ReadinessObservation | undefined;
    try {
      const { observation } = await awaitCondition(
        async () => (last = await observe()),
        (o) => o.podsRunning && o.markerSeen,
        policy,
        this.clock,
      );
      return observation;
    } catch (error) {
      if (error instanceof PollTimeout) {
        throw new DeploymentTimeout(
          workload.name,
          describeObservation(last),
          error.attempts,
        );
      }
      throw error;
    }
  }

  /**
   * Structural signal only: the marker check is vacuously true
   */
  async observePods(workload: WorkloadSpec): Promise<ReadinessObservation> {
    const outcome = await this.controlPlane.get("pods", undefined, {
      namespace: this.namespace,
      selector: workload.selector,
    });
    return {
      podsRunning: outcome.ok && outcome.stdout.includes("Running"),
      podText: outcome.ok ? outcome.stdout : outcome.stderr,
      markerSeen: true,
      logText: "",
    };
  }

  /**
   * Structural and content signals from the same round: logs are read only
   * once the pods run.
   */
  async observeController(
    workload: ControllerWorkload,
  ): Promise<ReadinessObservation> {
    const pods = await this.observePods(workload);
    if (!pods.podsRunning) {
      return { ...pods, markerSeen: false };
    }
    const logs = await this.controlPlane.logs(workload.resource, {
      namespace: this.namespace,
      tail: workload.logTail,
    });
    return {
      ...pods,
      markerSeen: logs.ok && logs.stdout.includes(workload.readyMarker),
      logText: logs.ok ? logs.stdout : logs.stderr,
    };
  }
}
