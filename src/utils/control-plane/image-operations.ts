import type { CommandOutcome } from "../../models/types.js";
import { type CommandRunner, runCommand } from "../command-runner.js";
import type { BuildRequest, ImageTool } from "./control-plane-types.js";

/**
 * Docker CLI backed image store
 */
export class DockerImageTool implements ImageTool {
  constructor(private run: CommandRunner = runCommand) {}

  async imageExists(image: string): Promise<boolean> {
    const outcome = await this.run("docker", ["image", "inspect", image]);
    return outcome.ok;
  }

  async build(request: BuildRequest): Promise<CommandOutcome> {
    return this.run(
      "docker",
      ["build", "-f", request.dockerfile, "-t", request.tag, "."],
      { cwd: request.context },
    );
  }

  async removeImage(image: string): Promise<CommandOutcome> {
    return this.run("docker", ["rmi", image]);
  }
}
