/**
 * LogCollector - snapshots every pod's combined container logs into a
 * per-test directory.
 *
 * Layout: <logRoot>/<test name>_<YYYYMMDD_HHMMSS>/<namespace>_<pod>.log, each file
 * starting with a four-line header.
 */

import { mkdir, writeFile } from "fs/promises";
import path from "path";
import type { CommandOutcome, LogSnapshot } from "../models/types.js";
import type { ClusterControlPlane } from "../utils/control-plane/index.js";
import logger from "../utils/logger.js";

export const HEADER_SEPARATOR = "=".repeat(60);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

interface PodRef {
  name: string;
  namespace: string;
}

/**
 * 2026-10-18T14:30:05.123Z -> 20261018_143005
 */
export function formatDirectoryTimestamp(date: Date): string {
  return date
    .toISOString()
    .substring(0, 19)
    .replace(/[-:]/g, "")
    .replace("T", "_");
}

/**
 * Keep test names usable as a single path segment
 */
export function sanitizeTestName(testName: string): string {
  const cleaned = testName.replace(/[^A-Za-z0-9._-]+/g, "_").replace(/^\.+/, "");
  return cleaned || "session";
}

export function formatLogHeader(pod: PodRef, capturedAt: string): string {
  return [
    `Pod: ${pod.name}`,
    `Namespace: ${pod.namespace}`,
    `Collected: ${capturedAt}`,
    HEADER_SEPARATOR,
    "",
  ].join("\n");
}

/**
 * Pull pod identities out of `kubectl get pods -o json` output
 */
export function parsePodList(json: string): PodRef[] {
  const parsed: unknown = JSON.parse(json);
  if (!isRecord(parsed) || !Array.isArray(parsed.items)) {
    throw new Error("Pod list has no items");
  }
  const items: unknown[] = parsed.items;
  const pods: PodRef[] = [];
  for (const item of items) {
    const metadata = isRecord(item) ? item.metadata : undefined;
    if (!isRecord(metadata) || typeof metadata.name !== "string") continue;
    pods.push({
      name: metadata.name,
      namespace:
        typeof metadata.namespace === "string" ? metadata.namespace : "default",
    });
  }
  return pods;
}

export class LogCollector {
  private controlPlane: ClusterControlPlane;
  private logRoot: string;
  private now: () => Date;

  constructor(
    controlPlane: ClusterControlPlane,
    logRoot: string,
    now: () => Date = () => new Date(),
  ) {
    this.controlPlane = controlPlane;
    this.logRoot = logRoot;
    this.now = now;
  }

  /**
   * Write one file per pod and return the run directory. Never throws for
   * control plane failures; those are logged and skipped.
   */
  async collect(testName: string): Promise<string> {
    const { directory } = await this.snapshot(testName);
    return directory;
  }

  async snapshot(
    testName: string,
  ): Promise<{ directory: string; snapshots: LogSnapshot[] }> {
    const directory = path.join(
      this.logRoot,
      `${sanitizeTestName(testName)}_${formatDirectoryTimestamp(this.now())}`,
    );
    await mkdir(directory, { recursive: true });
    logger.info(`Collecting logs to: ${directory}`);

    const snapshots: LogSnapshot[] = [];
    const pods = await this.listPods();

    for (const pod of pods) {
      logger.debug(`Collecting logs from ${pod.namespace}/${pod.name}...`);
      let outcome: CommandOutcome;
      try {
        outcome = await this.controlPlane.logs(pod.name, {
          namespace: pod.namespace,
          allContainers: true,
        });
      } catch (error) {
        logger.warn(`Failed to get logs from ${pod.name}: ${error}`);
        continue;
      }
      if (!outcome.ok) {
        logger.warn(`Failed to get logs from ${pod.name}: ${outcome.stderr.trim()}`);
        continue;
      }

      const capturedAt = this.now().toISOString();
      const file = path.join(directory, `${pod.namespace}_${pod.name}.log`);
      try {
        await writeFile(file, formatLogHeader(pod, capturedAt) + outcome.stdout);
      } catch (error) {
        logger.warn(`Failed to write logs for ${pod.name}: ${error}`);
        continue;
      }
      snapshots.push({
        pod: pod.name,
        namespace: pod.namespace,
        capturedAt,
        file,
      });
    }

    logger.info(`Logs collected in: ${directory} (${snapshots.length} pods)`);
    return { directory, snapshots };
  }

  private async listPods(): Promise<PodRef[]> {
    try {
      const outcome = await this.controlPlane.get("pods", undefined, {
        allNamespaces: true,
        output: "json",
      });
      if (!outcome.ok) {
        logger.warn(`Failed to get pods: ${outcome.stderr.trim()}`);
        return [];
      }
      return parsePodList(outcome.stdout);
    } catch (error) {
      logger.warn(`Failed to list pods: ${error}`);
      return [];
    }
  }
}
