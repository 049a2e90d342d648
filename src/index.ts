#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import dotenv from 'dotenv';
import { loadConfig } from './config.js';
import {
  createEnvironmentController,
  type EnvironmentController,
  workflowMarkers,
} from './controllers/environment-controller/index.js';
import { describeError, type Result } from './models/errors.js';
import type { Environment, NetworkDeviceSpec } from './models/types.js';
import { SyntheticFileServer } from './services/synthetic-file-server.js';
import logger from './utils/logger.js';

// Load environment variables
dotenv.config();

function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

function parsePortOption(value: string): number {
  const port = parseInt(value, 10);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError('Not a valid port.');
  }
  return port;
}

async function runSetup(
  controller: EnvironmentController,
  skipBuild: boolean,
): Promise<Environment> {
  let env = controller.createEnvironment();
  env = unwrap(await controller.setupCluster(env));
  env = unwrap(await controller.buildImages(env, skipBuild));
  env = unwrap(await controller.deployDependency(env));
  return unwrap(await controller.deployController(env));
}

async function serve(port: number) {
  const server = new SyntheticFileServer({ port });
  let shuttingDown = false;

  async function shutdown(signal: string) {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down...`);
    try {
      await server.stop();
    } catch (error) {
      logger.error(`Failed to stop synthetic file server: ${error}`);
      process.exitCode = 1;
    }
  }

  // Register shutdown handlers
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  await server.start();
  for (const name of await server.listFiles()) {
    console.log(server.urlFor(name));
  }
}

function buildProgram(): Command {
  const config = loadConfig();
  const program = new Command();

  program
    .name('netdevice-env')
    .description('Ephemeral test environments for the NetworkDevice controller');

  program
    .command('setup')
    .description('Create the cluster, prepare images and deploy Redis and the controller')
    .option('--skip-build', 'reuse images that already exist', config.skipBuild)
    .action(async (options: { skipBuild: boolean }) => {
      const controller = createEnvironmentController(config);
      const env = await runSetup(controller, options.skipBuild);
      logger.info(`Environment ${env.clusterName} is ${env.phase}`);
    });

  program
    .command('deploy')
    .description('Redeploy the controller into a running environment')
    .option('--rebuild', 'rebuild images even if they exist', false)
    .action(async (options: { rebuild: boolean }) => {
      const controller = createEnvironmentController(config);
      let env = controller.attach('ControllerReady');
      env = unwrap(await controller.buildImages(env, !options.rebuild));
      env = unwrap(await controller.deployController(env));
      logger.info(`Controller redeployed in ${env.clusterName}`);
    });

  program
    .command('device')
    .description('Create or update a NetworkDevice')
    .argument('<name>', 'device name')
    .option('--operation <operation>', 'operation type')
    .option('--action <action>', 'operation action')
    .option('--os-version <version>', 'target OS version')
    .option('--firmware-profile <profile>', 'firmware profile name')
    .option(
      '--wait',
      'wait until the controller reports an operation state and logs its workflow',
      false,
    )
    .action(
      async (
        name: string,
        options: {
          operation?: string;
          action?: string;
          osVersion?: string;
          firmwareProfile?: string;
          wait: boolean;
        },
      ) => {
        const overrides: Partial<NetworkDeviceSpec> = {
          operation: options.operation,
          operationAction: options.action,
          osVersion: options.osVersion,
          firmwareProfile: options.firmwareProfile,
        };
        const controller = createEnvironmentController(config);
        const env = unwrap(
          await controller.createDevice(controller.attach('ControllerReady'), name, overrides),
        );
        if (options.wait) {
          const device = unwrap(
            await controller.awaitDeviceState(
              env,
              name,
              (candidate) => Boolean(candidate.status?.operationState),
            ),
          );
          for (const marker of workflowMarkers(device.spec.operationAction)) {
            unwrap(await controller.awaitControllerLog(env, marker));
          }
          console.log(`${name}: ${device.status?.operationState}`);
        }
      },
    );

  program
    .command('status')
    .description('Show cluster, pod and NetworkDevice status')
    .action(async () => {
      const controller = createEnvironmentController(config);
      const report = unwrap(await controller.status(controller.attach('Steady')));
      console.log(
        `Cluster ${report.clusterName}: ${report.clusterRunning ? 'running' : 'not running'}`,
      );
      if (!report.clusterRunning) {
        console.log(report.clusterDetail);
        return;
      }
      console.log('Pods:');
      for (const pod of report.pods) {
        console.log(`  ${pod.name}\t${pod.phase}\t${pod.ready ? 'ready' : 'not ready'}`);
      }
      console.log('NetworkDevices:');
      for (const device of report.devices) {
        console.log(
          `  ${device.name}\t${device.operation}/${device.operationAction}\t` +
            `${device.operationState ?? '-'}\t${device.lastTransitionTime ?? '-'}`,
        );
      }
    });

  program
    .command('logs')
    .description('Collect every pod log into a directory for a test run')
    .argument('<test_name>', 'test run name')
    .action(async (testName: string) => {
      const controller = createEnvironmentController(config);
      const directory = unwrap(
        await controller.collectLogs(controller.attach('Steady'), testName),
      );
      console.log(directory);
    });

  program
    .command('cleanup')
    .description('Delete devices, workloads, the cluster and the controller image')
    .action(async () => {
      const controller = createEnvironmentController(config);
      let env = controller.attach('Steady');
      const adopted = await controller.adoptDevices(env);
      if (adopted.ok) {
        env = adopted.value;
      } else {
        logger.warn(`Could not list existing devices: ${describeError(adopted.error)}`);
      }

      const report = unwrap(await controller.teardown(env));
      if (report.warnings.length === 0) {
        logger.info('Cleanup completed');
        return;
      }
      console.log(`Cleanup completed with ${report.warnings.length} warning(s):`);
      for (const warning of report.warnings) {
        console.log(`  ${warning.target}: ${warning.message}`);
      }
    });

  program
    .command('serve')
    .description('Serve synthetic firmware files until interrupted')
    .option('--port <port>', 'port to listen on', parsePortOption, config.syntheticServerPort)
    .action(async (options: { port: number }) => {
      await serve(options.port);
    });

  return program;
}

// Main function
async function main() {
  try {
    await buildProgram().parseAsync(process.argv);
  } catch (error) {
    logger.error(describeError(error));
    process.exit(1);
  }
}

// Start the application
main().catch((err) => {
  logger.error(`Unhandled error: ${err}`);
  process.exit(1);
});
