import path from "path";
import { ImageBuildError, ImagePublishError } from "../../core/errors.js";
import { dockerImageName, type FrameworkDefinition, type ImageReference } from "../../core/definitions.js";
import type { Logger } from "../../core/logger.js";
import type { ContainerEngine } from "../backends/types.js";
import { generateDockerfile } from "./dockerfile.js";

export type SetupMode = "skip" | "auto" | "force";

export type SetupState = "skipped" | "present" | "built" | "published";

export interface SetupReport {
  image: ImageReference;
  state: SetupState;
  dockerfile: string | null;
}

export interface ImageManagerSettings {
  frameworksDir: string;
  buildContextDir: string;
  script: string;
}

export class ImageManager {
  constructor(
    private readonly deps: {
      engine: ContainerEngine;
      settings: ImageManagerSettings;
      logger: Logger;
    }
  ) {}

  frameworkDir(framework: FrameworkDefinition): string {
    return path.join(this.deps.settings.frameworksDir, framework.name);
  }

  async exists(image: ImageReference): Promise<boolean> {
    const found = await this.deps.engine.checkImage(image);
    this.deps.logger.debug("docker image %s present: %s", image, found);
    return found;
  }

  async build(dockerfile: string, image: ImageReference, cache: boolean): Promise<void> {
    this.deps.logger.info("Building docker image %s", image);
    const res = await this.deps.engine.buildImage({
      dockerfile,
      image,
      contextDir: this.deps.settings.buildContextDir,
      cache
    });
    if (res.exitCode !== 0) {
      throw new ImageBuildError(image, res.exitCode, res.output);
    }
    this.deps.logger.info("Successfully built docker image %s", image);
    this.deps.logger.debug(res.output);
  }

  async publish(image: ImageReference): Promise<void> {
    this.deps.logger.info("Publishing docker image %s", image);
    const res = await this.deps.engine.pushImage(image);
    if (res.exitCode !== 0) {
      throw new ImagePublishError(image, res.step, res.exitCode, res.output);
    }
    this.deps.logger.info("Successfully published docker image %s", image);
    this.deps.logger.debug(res.output);
  }

  async setup(input: { framework: FrameworkDefinition; mode: SetupMode; upload?: boolean }): Promise<SetupReport> {
    const image = dockerImageName(input.framework);
    if (input.mode === "skip") {
      return { image, state: "skipped", dockerfile: null };
    }

    if (input.mode === "auto" && (await this.exists(image))) {
      return { image, state: "present", dockerfile: null };
    }

    const dockerfile = await generateDockerfile(this.frameworkDir(input.framework), {
      framework: input.framework.name,
      customCommands: input.framework.dockerCommands ?? "",
      script: this.deps.settings.script
    });
    await this.build(dockerfile, image, input.mode !== "force");

    if (input.upload) {
      await this.publish(image);
      return { image, state: "published", dockerfile };
    }
    return { image, state: "built", dockerfile };
  }
}
