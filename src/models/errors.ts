/**
 * Error taxonomy for environment orchestration.
 *
 * Services throw these inside a phase; the environment controller converts
 * them into `Result` failures at each phase boundary.
 */

export type Result<T, E = EnvironmentError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export const Success = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const Failure = <E>(error: E): Result<never, E> => ({ ok: false, error });

export abstract class EnvironmentError extends Error {
  /** Diagnostic text captured from the underlying command, if any */
  readonly detail: string;

  constructor(message: string, detail = "", options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.detail = detail;
  }
}

export type SetupStage = "cluster" | "images";

export class SetupFailure extends EnvironmentError {
  readonly stage: SetupStage;

  constructor(
    stage: SetupStage,
    message: string,
    detail = "",
    options?: { cause?: unknown },
  ) {
    super(message, detail, options);
    this.stage = stage;
  }
}

export class BuildFailure extends SetupFailure {
  readonly image: string;

  constructor(image: string, message: string, detail = "") {
    super("images", message, detail);
    this.image = image;
  }
}

export class DeploymentFailure extends EnvironmentError {
  readonly workload: string;

  constructor(
    workload: string,
    message: string,
    detail = "",
    options?: { cause?: unknown },
  ) {
    super(message, detail, options);
    this.workload = workload;
  }
}

export class DeploymentTimeout extends EnvironmentError {
  readonly workload: string;

  constructor(workload: string, lastState: string, attempts: number) {
    super(
      `${workload} not ready after ${attempts} attempts`,
      lastState,
    );
    this.workload = workload;
  }
}

export class ConfigurationFailure extends EnvironmentError {
  readonly command: string;

  constructor(command: string, detail = "") {
    super(`Configuration command failed: ${command}`, detail);
    this.command = command;
  }
}

export class ResourceCreationFailure extends EnvironmentError {
  readonly resource: string;

  constructor(resource: string, detail = "", options?: { cause?: unknown }) {
    super(`Failed to create NetworkDevice ${resource}`, detail, options);
    this.resource = resource;
  }
}

export class ResourceDeletionFailure extends EnvironmentError {
  readonly resource: string;

  constructor(resource: string, detail = "", options?: { cause?: unknown }) {
    super(`Failed to delete NetworkDevice ${resource}`, detail, options);
    this.resource = resource;
  }
}

export class PollTimeout<T = unknown> extends EnvironmentError {
  readonly lastObservation: T | undefined;
  readonly attempts: number;

  constructor(attempts: number, lastObservation: T | undefined) {
    super(`Condition not met after ${attempts} attempts`);
    this.attempts = attempts;
    this.lastObservation = lastObservation;
  }
}

/** The control plane tool could not be run at all */
export class ControlPlaneError extends EnvironmentError {
  readonly command: string;

  constructor(command: string, options?: { cause?: unknown }) {
    const reason =
      options?.cause instanceof Error ? options.cause.message : String(options?.cause);
    super(`Could not run ${command}: ${reason}`, "", options);
    this.command = command;
  }
}

export class LogCollectionFailure extends EnvironmentError {
  constructor(testName: string, detail = "", options?: { cause?: unknown }) {
    super(`Failed to collect logs for ${testName}`, detail, options);
  }
}

export class InvalidTransition extends EnvironmentError {
  constructor(operation: string, phase: string) {
    super(`${operation} is not valid in phase ${phase}`);
  }
}

/**
 * Render an error for operators: message plus any captured diagnostic text.
 */
export function describeError(error: unknown): string {
  if (error instanceof EnvironmentError) {
    const detail = error.detail.trim();
    return detail ? `${error.message}: ${detail}` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}
