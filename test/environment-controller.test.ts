import { mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { fileURLToPath } from "url";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { type EnvironmentConfig, loadConfig } from "../src/config.js";
import { nodesReady } from "../src/controllers/environment-controller/cluster-lifecycle.js";
import {
  EnvironmentController,
  workflowMarkers,
} from "../src/controllers/environment-controller/index.js";
import {
  BuildFailure,
  DeploymentFailure,
  InvalidTransition,
  PollTimeout,
  type Result,
  SetupFailure,
} from "../src/models/errors.js";
import type { NetworkDevice } from "../src/models/types.js";
import { CONTROLLER_DOCKERFILE, HELPER_DOCKERFILE } from "../src/services/image-builder.js";
import { buildDeviceManifest, mergeDeviceSpec } from "../src/services/resource-registry.js";
import {
  FakeClock,
  FakeControlPlane,
  FakeDeviceClient,
  FakeImageTool,
  fail,
  ok,
  sequence,
} from "./helpers/fakes.js";

const MANIFESTS_DIR = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  "..",
  "manifests",
);

const NODE_TABLE =
  "NAME         STATUS   ROLES           AGE   VERSION\n" +
  "sonic-test   Ready    control-plane   42s   v1.29.0\n";

function expectOk<T>(result: Result<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

function expectFailure<T>(result: Result<T>) {
  if (result.ok) {
    throw new Error("expected the operation to fail");
  }
  return result.error;
}

function device(name: string, status?: NetworkDevice["status"]): NetworkDevice {
  return { ...buildDeviceManifest(name, "default", mergeDeviceSpec()), status };
}

describe("nodesReady", () => {
  it("accepts a table whose nodes are all Ready", () => {
    expect(nodesReady(NODE_TABLE)).toBe(true);
  });

  it("does not mistake NotReady for Ready", () => {
    expect(
      nodesReady(
        "NAME         STATUS     ROLES           AGE   VERSION\n" +
          "sonic-test   NotReady   control-plane   5s    v1.29.0\n",
      ),
    ).toBe(false);
  });

  it("treats a cordoned node as Ready", () => {
    expect(
      nodesReady(
        "NAME   STATUS                     ROLES    AGE   VERSION\n" +
          "n1     Ready,SchedulingDisabled   <none>   1m    v1.29.0\n",
      ),
    ).toBe(true);
  });

  it("needs at least one node", () => {
    expect(nodesReady("NAME   STATUS   ROLES   AGE   VERSION\n")).toBe(false);
    expect(nodesReady("")).toBe(false);
  });
});

describe("workflowMarkers", () => {
  it("expects the preload completion line only for a preload", () => {
    expect(workflowMarkers("PreloadImage")).toEqual([
      "NetworkDevice ADDED",
      "Starting workflow execution",
      "Preload workflow completed successfully",
    ]);
    expect(workflowMarkers("InstallImage")).toEqual([
      "NetworkDevice ADDED",
      "Starting workflow execution",
    ]);
  });
});

describe("EnvironmentController", () => {
  let workDir: string;
  let controlPlane: FakeControlPlane;
  let imageTool: FakeImageTool;
  let deviceClient: FakeDeviceClient;
  let clock: FakeClock;

  function makeConfig(overrides: Partial<EnvironmentConfig> = {}): EnvironmentConfig {
    return {
      ...loadConfig({}),
      manifestsDir: MANIFESTS_DIR,
      controllerSourceDir: workDir,
      logDir: path.join(workDir, "logs"),
      ...overrides,
    };
  }

  function makeController(overrides: Partial<EnvironmentConfig> = {}) {
    return new EnvironmentController(makeConfig(overrides), {
      controlPlane,
      imageTool,
      deviceClient,
      clock,
      now: () => new Date("2026-10-18T14:30:05.000Z"),
    });
  }

  beforeEach(async () => {
    workDir = await mkdtemp(path.join(os.tmpdir(), "environment-controller-test-"));
    await writeFile(path.join(workDir, CONTROLLER_DOCKERFILE), "FROM scratch\n");
    await writeFile(path.join(workDir, HELPER_DOCKERFILE), "FROM scratch\n");

    controlPlane = new FakeControlPlane();
    controlPlane.onGet = (kind, _name, options) => {
      if (kind === "nodes") {
        return options?.output ? ok("192.168.49.2") : ok(NODE_TABLE);
      }
      return ok("sonic-change-agent-x7k2p   2/2   Running   0   12s");
    };
    controlPlane.onLogs = () => ok("I1018 Cache synced successfully\n");

    imageTool = new FakeImageTool();
    deviceClient = new FakeDeviceClient();
    clock = new FakeClock();
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  describe("setup", () => {
    it("walks every phase up to Steady", async () => {
      const controller = makeController();

      let env = controller.createEnvironment();
      expect(env.phase).toBe("Uninitialized");

      env = expectOk(await controller.setupCluster(env));
      expect(env.phase).toBe("ClusterReady");
      expect(controlPlane.callsTo("createCluster")).toEqual([
        ["sonic-test", { driver: "docker", kubernetesVersion: "v1.29.0" }],
      ]);

      env = expectOk(await controller.buildImages(env));
      expect(env.phase).toBe("ImagesReady");
      expect(imageTool.builds.map((build) => build.tag)).toEqual([
        "sonic-change-agent:test",
        "gnoi-light:test",
      ]);
      expect(controlPlane.callsTo("loadImage")).toEqual([
        ["sonic-change-agent:test"],
        ["gnoi-light:test"],
      ]);

      env = expectOk(await controller.deployDependency(env));
      expect(env.phase).toBe("DependencyReady");

      env = expectOk(await controller.deployController(env));
      expect(env.phase).toBe("ControllerReady");

      env = expectOk(await controller.createDevice(env, "sonic-test"));
      expect(env.phase).toBe("Steady");
      expect(env.devices).toEqual([
        { kind: "NetworkDevice", namespace: "default", name: "sonic-test" },
      ]);

      env = expectOk(await controller.deleteDevice(env, "sonic-test"));
      expect(env.phase).toBe("Steady");
      expect(env.devices).toEqual([]);
    });

    it("returns new values and leaves the previous Environment untouched", async () => {
      const controller = makeController();
      const initial = controller.createEnvironment();

      const next = expectOk(await controller.setupCluster(initial));

      expect(next).not.toBe(initial);
      expect(initial.phase).toBe("Uninitialized");
    });

    it("rejects phases out of order without touching the cluster", async () => {
      const controller = makeController();

      const error = expectFailure(await controller.buildImages(controller.createEnvironment()));

      expect(error).toBeInstanceOf(InvalidTransition);
      expect(error.message).toBe("buildImages is not valid in phase Uninitialized");
      expect(controlPlane.calls).toEqual([]);
      expect(imageTool.builds).toEqual([]);
    });

    it("halts on a cluster creation failure with the tool's output", async () => {
      controlPlane.onCreateCluster = () => fail("Exiting due to DRV_NOT_DETECTED");
      const controller = makeController();

      const error = expectFailure(await controller.setupCluster(controller.createEnvironment()));

      expect(error).toBeInstanceOf(SetupFailure);
      expect(error).toMatchObject({
        stage: "cluster",
        message: "Failed to create cluster sonic-test",
        detail: "Exiting due to DRV_NOT_DETECTED",
      });
      expect(controlPlane.callsTo("get")).toEqual([]);
    });

    it("times out when nodes stay NotReady", async () => {
      controlPlane.onGet = () =>
        ok("NAME         STATUS     ROLES   AGE   VERSION\nsonic-test   NotReady   <none>  3s    v1.29.0\n");
      const controller = new EnvironmentController(makeConfig(), {
        controlPlane,
        imageTool,
        deviceClient,
        clock,
        policies: { clusterReady: { intervalMs: 1000, maxAttempts: 3 } },
      });

      const error = expectFailure(await controller.setupCluster(controller.createEnvironment()));

      expect(error).toMatchObject({
        name: "SetupFailure",
        message: "Cluster sonic-test nodes not ready after 3 attempts",
      });
      expect(clock.sleeps).toEqual([1000, 1000]);
    });

    it("keeps a running cluster when the session is reusable", async () => {
      const controller = makeController({ reuse: true });

      const env = expectOk(await controller.setupCluster(controller.createEnvironment()));

      expect(env.phase).toBe("ClusterReady");
      expect(controlPlane.callsTo("createCluster")).toEqual([]);
      expect(controlPlane.callsTo("deleteCluster")).toEqual([]);
    });

    it("deletes a leftover profile before creating a disposable cluster", async () => {
      const controller = makeController();

      expectOk(await controller.setupCluster(controller.createEnvironment()));

      expect(controlPlane.calls.map((call) => call.method)).toEqual([
        "deleteCluster",
        "createCluster",
        "get",
      ]);
      expect(controlPlane.callsTo("deleteCluster")).toEqual([["sonic-test"]]);
    });

    it("creates the cluster even when the leftover profile cannot be deleted", async () => {
      controlPlane.onDeleteCluster = () => fail("minikube: permission denied");
      const controller = makeController();

      const env = expectOk(await controller.setupCluster(controller.createEnvironment()));

      expect(env.phase).toBe("ClusterReady");
      expect(controlPlane.callsTo("createCluster")).toHaveLength(1);
    });

    it("surfaces a build failure from the image phase", async () => {
      imageTool.buildOutcome = fail("COPY failed: no source files");
      const controller = makeController();

      const error = expectFailure(await controller.buildImages(controller.attach("ClusterReady")));

      expect(error).toBeInstanceOf(BuildFailure);
      expect(error.detail).toBe("COPY failed: no source files");
      expect(controlPlane.callsTo("loadImage")).toEqual([]);
    });

    it("wraps unexpected errors into the phase's own failure", async () => {
      controlPlane.onExec = () => {
        throw new Error("socket hang up");
      };
      const controller = makeController();

      const error = expectFailure(
        await controller.deployDependency(controller.attach("ImagesReady")),
      );

      expect(error).toBeInstanceOf(DeploymentFailure);
      expect(error.message).toBe("Failed to deploy redis");
      expect(error.detail).toBe("socket hang up");
      expect(error.cause).toBeInstanceOf(Error);
    });
  });

  describe("steady state", () => {
    it("allows device operations only once the controller is ready", async () => {
      const controller = makeController();

      const error = expectFailure(
        await controller.createDevice(controller.attach("DependencyReady"), "sonic-test"),
      );

      expect(error.message).toBe("createDevice is not valid in phase DependencyReady");
      expect(controlPlane.callsTo("apply")).toEqual([]);
    });

    it("redeploys the controller without leaving Steady", async () => {
      const controller = makeController();

      const env = expectOk(await controller.deployController(controller.attach("Steady")));

      expect(env.phase).toBe("Steady");
    });

    it("waits for the controller to report an operation state", async () => {
      deviceClient.onGetDevice = sequence<NetworkDevice | null>([
        null,
        device("sonic-test"),
        device("sonic-test", { operationState: "Completed", lastTransitionTime: "2026-10-18T14:31:00Z" }),
      ]);
      const controller = makeController();

      const observed = expectOk(
        await controller.awaitDeviceState(
          controller.attach("Steady"),
          "sonic-test",
          (candidate) => Boolean(candidate.status?.operationState),
        ),
      );

      expect(observed.status?.operationState).toBe("Completed");
      expect(clock.sleeps).toEqual([2000, 2000]);
    });

    it("times out waiting for a device state", async () => {
      deviceClient.devices = [device("sonic-test")];
      const controller = makeController();

      const error = expectFailure(
        await controller.awaitDeviceState(
          controller.attach("Steady"),
          "sonic-test",
          (candidate) => candidate.status?.operationState === "Completed",
          { intervalMs: 1, maxAttempts: 2 },
        ),
      );

      expect(error).toBeInstanceOf(PollTimeout);
      expect(error).toMatchObject({ attempts: 2 });
    });

    it("waits for a workflow line in the controller logs", async () => {
      controlPlane.onLogs = sequence([
        ok("I1018 Cache synced successfully\n"),
        ok("I1018 NetworkDevice ADDED: sonic-test\nI1018 Starting workflow execution\n"),
      ]);
      const controller = makeController({ namespace: "lab" });

      const text = expectOk(
        await controller.awaitControllerLog(
          controller.attach("Steady"),
          "Starting workflow execution",
        ),
      );

      expect(text).toBe(
        "I1018 NetworkDevice ADDED: sonic-test\nI1018 Starting workflow execution\n",
      );
      expect(controlPlane.callsTo("logs")).toEqual([
        ["daemonset/sonic-change-agent", { namespace: "lab", tail: 200 }],
        ["daemonset/sonic-change-agent", { namespace: "lab", tail: 200 }],
      ]);
      expect(clock.sleeps).toEqual([2000]);
    });

    it("times out when a workflow line never appears", async () => {
      controlPlane.onLogs = () => ok("I1018 Cache synced successfully\n");
      const controller = makeController();

      const error = expectFailure(
        await controller.awaitControllerLog(
          controller.attach("Steady"),
          "Preload workflow completed successfully",
          { intervalMs: 1, maxAttempts: 3 },
        ),
      );

      expect(error).toBeInstanceOf(PollTimeout);
      expect(error).toMatchObject({ attempts: 3 });
    });

    it("reads controller logs only once the controller is deployed", async () => {
      const controller = makeController();

      const error = expectFailure(
        await controller.awaitControllerLog(
          controller.attach("DependencyReady"),
          "NetworkDevice ADDED",
        ),
      );

      expect(error).toBeInstanceOf(InvalidTransition);
      expect(controlPlane.callsTo("logs")).toEqual([]);
    });

    it("reports cluster, pod and device status", async () => {
      deviceClient.pods = [
        { name: "redis-abc", namespace: "default", phase: "Running", ready: true },
      ];
      deviceClient.devices = [
        device("sonic-test", {
          operationState: "Completed",
          lastTransitionTime: "2026-10-18T14:31:00Z",
        }),
      ];
      const controller = makeController();

      const report = expectOk(await controller.status(controller.attach("Steady")));

      expect(report).toEqual({
        clusterName: "sonic-test",
        clusterRunning: true,
        clusterDetail: "host: Running",
        pods: [{ name: "redis-abc", namespace: "default", phase: "Running", ready: true }],
        devices: [
          {
            name: "sonic-test",
            operation: "OSUpgrade",
            operationAction: "PreloadImage",
            operationState: "Completed",
            lastTransitionTime: "2026-10-18T14:31:00Z",
          },
        ],
      });
    });

    it("reports a stopped cluster without querying it", async () => {
      controlPlane.onClusterStatus = () => fail('Profile "sonic-test" not found.\n');
      deviceClient.devices = [device("sonic-test")];
      const controller = makeController();

      const report = expectOk(await controller.status(controller.attach("Steady")));

      expect(report.clusterRunning).toBe(false);
      expect(report.clusterDetail).toBe('Profile "sonic-test" not found.');
      expect(report.devices).toEqual([]);
    });

    it("collects logs into a directory under the log root", async () => {
      controlPlane.onGet = () => ok(JSON.stringify({ items: [] }));
      const controller = makeController();

      const directory = expectOk(
        await controller.collectLogs(controller.attach("Steady"), "test_preload"),
      );

      expect(directory).toBe(path.join(workDir, "logs", "test_preload_20261018_143005"));
    });
  });

  describe("teardown", () => {
    it("cleans up in reverse and reports every failure as a warning", async () => {
      const controller = makeController();
      let env = controller.attach("Steady");
      env = expectOk(await controller.createDevice(env, "leaf-1"));
      env = expectOk(await controller.createDevice(env, "leaf-2"));
      controlPlane.onDelete = (kind, name) =>
        kind === "networkdevice" && name === "leaf-1" ? fail("etcdserver: request timed out") : ok();
      controlPlane.onDeleteCluster = () => fail("profile is locked\n");

      const report = expectOk(await controller.teardown(env));

      expect(report.environment.phase).toBe("Destroyed");
      expect(report.environment.devices).toEqual([]);
      expect(report.warnings).toEqual([
        {
          kind: "CleanupWarning",
          target: "networkdevice/leaf-1",
          message: "etcdserver: request timed out",
        },
        { kind: "CleanupWarning", target: "cluster/sonic-test", message: "profile is locked" },
      ]);
      expect(controlPlane.callsTo("delete")).toEqual([
        ["networkdevice", "leaf-2", "default"],
        ["networkdevice", "leaf-1", "default"],
        ["daemonset", "sonic-change-agent", "default"],
        ["deployment", "redis", "default"],
      ]);
      expect(imageTool.removed).toEqual(["sonic-change-agent:test"]);
    });

    it("treats Destroyed as terminal", async () => {
      const controller = makeController();
      const { environment } = expectOk(await controller.teardown(controller.attach("Steady")));

      const create = expectFailure(await controller.createDevice(environment, "sonic-test"));
      const again = expectFailure(await controller.teardown(environment));
      const logs = expectFailure(await controller.collectLogs(environment, "late"));

      expect(create.message).toBe("createDevice is not valid in phase Destroyed");
      expect(again.message).toBe("teardown is not valid in phase Destroyed");
      expect(logs).toBeInstanceOf(InvalidTransition);
    });

    it("only deletes the cluster when nothing was deployed", async () => {
      const controller = makeController();

      const report = expectOk(await controller.teardown(controller.createEnvironment()));

      expect(report.warnings).toEqual([]);
      expect(controlPlane.calls.map((call) => call.method)).toEqual(["deleteCluster"]);
      expect(imageTool.removed).toEqual([]);
    });

    it("adopts devices left by an earlier process", async () => {
      deviceClient.devices = [device("leaf-9")];
      const controller = makeController();

      const env = expectOk(await controller.adoptDevices(controller.attach("Steady")));
      expect(env.devices).toEqual([
        { kind: "NetworkDevice", namespace: "default", name: "leaf-9" },
      ]);

      expectOk(await controller.teardown(env));
      expect(controlPlane.callsTo("delete")[0]).toEqual(["networkdevice", "leaf-9", "default"]);
    });

    it("keeps a reusable environment at the end of a session", async () => {
      const controller = makeController({ reuse: true });
      const env = controller.attach("Steady");

      const report = expectOk(await controller.finishSession(env));

      expect(report).toEqual({ environment: env, warnings: [] });
      expect(controlPlane.calls).toEqual([]);
    });

    it("tears down a disposable environment at the end of a session", async () => {
      const controller = makeController();

      const report = expectOk(await controller.finishSession(controller.attach("Steady")));

      expect(report.environment.phase).toBe("Destroyed");
      expect(controlPlane.callsTo("deleteCluster")).toEqual([["sonic-test"]]);
    });
  });
});
