/**
 * Environment configuration.
 *
 * Values come from process.env (populated from .env by dotenv in the CLI
 * entry point), with defaults for a local minikube run.
 */

import path from "path";
import { fileURLToPath } from "url";
import type { PollPolicy } from "./utils/poll.js";

const REPO_ROOT = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  "..",
);

/**
 * Log lines the controller emits, relied on for readiness and workflow checks.
 * Bump the version whenever the controller's wording changes.
 */
export const CONTROLLER_MARKERS = {
  version: 1,
  cacheSynced: "Cache synced successfully",
  deviceAdded: "NetworkDevice ADDED",
  workflowStarted: "Starting workflow execution",
  preloadCompleted: "Preload workflow completed successfully",
} as const;

/**
 * Fixed polling budgets for known-slow operations.
 */
export const POLL_POLICIES = {
  clusterReady: { intervalMs: 5_000, maxAttempts: 30 },
  crdEstablished: { intervalMs: 5_000, maxAttempts: 12 },
  dependencyReady: { intervalMs: 5_000, maxAttempts: 12 },
  controllerReady: { intervalMs: 5_000, maxAttempts: 24 },
  deviceState: { intervalMs: 2_000, maxAttempts: 30 },
} satisfies Record<string, PollPolicy>;

export interface EnvironmentConfig {
  clusterName: string;
  namespace: string;
  kubernetesVersion: string;
  driver: string;
  images: {
    primary: string;
    helper: string;
  };
  /** Directory holding the controller's Dockerfiles (build context) */
  controllerSourceDir: string;
  manifestsDir: string;
  logDir: string;
  skipBuild: boolean;
  dryRun: boolean;
  reuse: boolean;
  syntheticServerPort: number;
}

/**
 * Parse a boolean-like environment value. Unset or empty yields the fallback.
 */
export function parseBoolean(
  value: string | undefined,
  fallback: boolean,
): boolean {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

function parsePort(value: string | undefined, fallback: number): number {
  const port = parseInt(value || `${fallback}`, 10);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid port: ${value}`);
  }
  return port;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
): EnvironmentConfig {
  return {
    clusterName: env.CLUSTER_NAME || "sonic-test",
    namespace: env.NAMESPACE || "default",
    kubernetesVersion: env.KUBERNETES_VERSION || "v1.29.0",
    driver: env.MINIKUBE_DRIVER || "docker",
    images: {
      primary: env.CONTROLLER_IMAGE || "sonic-change-agent:test",
      helper: env.HELPER_IMAGE || "gnoi-light:test",
    },
    controllerSourceDir: path.resolve(env.CONTROLLER_SOURCE_DIR || process.cwd()),
    manifestsDir: path.resolve(env.MANIFESTS_DIR || path.join(REPO_ROOT, "manifests")),
    logDir: path.resolve(env.LOG_DIR || "test_logs"),
    skipBuild: parseBoolean(env.SKIP_DOCKER_BUILD, false),
    dryRun: parseBoolean(env.DRY_RUN, true),
    reuse: parseBoolean(env.REUSE_ENV, false),
    syntheticServerPort: parsePort(env.SYNTHETIC_SERVER_PORT, 8080),
  };
}
