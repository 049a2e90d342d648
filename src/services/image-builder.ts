import { access } from "fs/promises";
import path from "path";
import { BuildFailure } from "../models/errors.js";
import type { ImageSet } from "../models/types.js";
import type { ImageTool } from "../utils/control-plane/index.js";
import logger from "../utils/logger.js";

export interface ImageBuildResult {
  image: string;
  /** False when an existing image was reused */
  built: boolean;
}

export const CONTROLLER_DOCKERFILE = "Dockerfile.sonic-change-agent";
export const HELPER_DOCKERFILE = "Dockerfile.gnoi-light";

export class ImageBuilder {
  private imageTool: ImageTool;
  private sourceDir: string;

  /**
   * @param sourceDir - controller checkout holding the Dockerfiles; also the
   * build context
   */
  constructor(imageTool: ImageTool, sourceDir: string) {
    this.imageTool = imageTool;
    this.sourceDir = sourceDir;
  }

  async ensureImage(
    name: string,
    dockerfilePath: string,
    buildContext: string,
    skipIfExists: boolean,
  ): Promise<ImageBuildResult> {
    if (skipIfExists && (await this.imageTool.imageExists(name))) {
      logger.info(`Using existing Docker image: ${name}`);
      return { image: name, built: false };
    }

    try {
      await access(dockerfilePath);
    } catch {
      throw new BuildFailure(name, `Dockerfile not found at ${dockerfilePath}`);
    }

    logger.info(`Building Docker image ${name} from ${dockerfilePath}`);
    const outcome = await this.imageTool.build({
      dockerfile: dockerfilePath,
      tag: name,
      context: buildContext,
    });
    if (!outcome.ok) {
      throw new BuildFailure(
        name,
        `Failed to build image ${name}`,
        outcome.stderr || outcome.stdout,
      );
    }
    return { image: name, built: true };
  }

  /**
   * Ensure the controller image and its protocol-helper image
   */
  async ensureImages(
    images: ImageSet,
    skipIfExists: boolean,
  ): Promise<ImageBuildResult[]> {
    logger.info(`Preparing Docker images: ${images.primary}, ${images.helper}`);
    const results = [
      await this.ensureImage(
        images.primary,
        path.join(this.sourceDir, CONTROLLER_DOCKERFILE),
        this.sourceDir,
        skipIfExists,
      ),
      await this.ensureImage(
        images.helper,
        path.join(this.sourceDir, HELPER_DOCKERFILE),
        this.sourceDir,
        skipIfExists,
      ),
    ];
    logger.info("Docker images ready");
    return results;
  }

  async removeImage(image: string) {
    return this.imageTool.removeImage(image);
  }
}
