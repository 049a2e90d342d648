import { execFile } from "child_process";
import { promisify } from "util";
import { ControlPlaneError } from "../models/errors.js";
import type { CommandOutcome } from "../models/types.js";
import logger from "./logger.js";

const execFileAsync = promisify(execFile);

const MAX_BUFFER = 50 * 1024 * 1024;

export interface RunOptions {
  cwd?: string;
  timeoutMs?: number;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: RunOptions,
) => Promise<CommandOutcome>;

/**
 * Strip ANSI escape codes from tool output.
 */
function stripAnsi(str: string): string {
  return str.replace(
    /\x1b\[[0-9;?]*[a-zA-Z]|\x1b\][^\x07]*\x07|\x1b[()][AB012]|\x1b[a-zA-Z]/g,
    "",
  );
}

/**
 * Run a command without a shell.
 *
 * A non-zero exit resolves to `ok: false` with the captured output. A process
 * that cannot be started at all rejects with ControlPlaneError.
 */
export const runCommand: CommandRunner = async (command, args, options = {}) => {
  const rendered = [command, ...args].join(" ");
  logger.debug(`$ ${rendered}`);

  try {
    const result = await execFileAsync(command, args, {
      cwd: options.cwd,
      timeout: options.timeoutMs,
      maxBuffer: MAX_BUFFER,
      encoding: "utf-8",
    });
    return {
      ok: true,
      stdout: stripAnsi(result.stdout),
      stderr: stripAnsi(result.stderr),
    };
  } catch (error) {
    const err = error as {
      stdout?: string;
      stderr?: string;
      message?: string;
      code?: number | string;
      killed?: boolean;
    };

    // Exit codes are numeric; spawn failures carry an errno string like ENOENT
    if (typeof err.code !== "number" && !err.killed) {
      throw new ControlPlaneError(rendered, { cause: error });
    }

    let stderr = stripAnsi(err.stderr || err.message || "Unknown error");
    if (err.killed) {
      stderr = `[TIMEOUT] ${command} killed after ${(options.timeoutMs ?? 0) / 1000}s\n\n${stderr}`;
    }
    return {
      ok: false,
      stdout: stripAnsi(err.stdout || ""),
      stderr,
    };
  }
};
