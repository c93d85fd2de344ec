import { ContainerRunError } from "../../core/errors.js";
import type { Logger } from "../../core/logger.js";
import type { ContainerEngine, RunContainerSpec } from "../backends/types.js";

export const CONTAINER_INPUT_DIR = "/input";
export const CONTAINER_OUTPUT_DIR = "/output";

// Appended to every in-container command: fixed mount points, and the image is already set up.
export const CONTAINER_SUFFIX_ARGS: readonly string[] = ["-i", CONTAINER_INPUT_DIR, "-o", CONTAINER_OUTPUT_DIR, "-s", "skip"];

export class ContainerInvoker {
  constructor(
    private readonly deps: {
      engine: ContainerEngine;
      logger: Logger;
      inputReadOnly?: boolean;
    }
  ) {}

  runSpec(image: string, inputDir: string, outputDir: string, params: readonly string[]): RunContainerSpec {
    return {
      image,
      mounts: [
        { hostPath: inputDir, containerPath: CONTAINER_INPUT_DIR, readOnly: this.deps.inputReadOnly ?? true },
        { hostPath: outputDir, containerPath: CONTAINER_OUTPUT_DIR, readOnly: false }
      ],
      remove: true,
      args: [...params, ...CONTAINER_SUFFIX_ARGS]
    };
  }

  /** Runs one container to completion and returns its combined stdout/stderr. */
  async run(image: string, inputDir: string, outputDir: string, params: readonly string[]): Promise<string> {
    const spec = this.runSpec(image, inputDir, outputDir, params);
    const { engine, logger } = this.deps;

    logger.info("Starting docker: %s", engine.renderRunCommand(spec));
    logger.info("Datasets are loaded by default from folder %s", inputDir);
    logger.info("Generated files will be available in folder %s", outputDir);

    const res = await engine.runContainer(spec);
    logger.debug(res.output);
    if (res.exitCode !== 0) {
      throw new ContainerRunError(image, res.exitCode, res.output);
    }
    return res.output;
  }
}
