import type { RunConfiguration } from "../config/config.js";
import { clampParallelJobs } from "../config/config.js";
import {
  dockerImageName,
  type BenchmarkDefinition,
  type FrameworkDefinition,
  type ImageReference
} from "../core/definitions.js";
import { newRunId, type RunId } from "../core/ids.js";
import type { Logger } from "../core/logger.js";
import type { DefinitionResolver } from "../definitions/resolver.js";
import { findTask } from "../definitions/resolver.js";
import type { ContainerEngine } from "../execution/backends/types.js";
import { ContainerInvoker } from "../execution/docker/containerInvoker.js";
import { ImageManager, type SetupMode, type SetupReport } from "../execution/docker/imageManager.js";
import type { Job } from "../jobs/job.js";
import { jobsForBenchmark, jobsForTask, type FoldSelector, type JobContext } from "../jobs/jobFactory.js";
import { runJobs } from "../jobs/jobRunner.js";
import type { MergedResults, ResultMerger } from "../results/scoreboard.js";

export interface DockerBenchmarkDeps {
  run: RunConfiguration;
  resolver: DefinitionResolver;
  engine: ContainerEngine;
  merger: ResultMerger;
  logger: Logger;
}

export interface RunOptions {
  saveScores?: boolean;
  runId?: RunId;
}

/**
 * Runs a benchmark for one framework inside that framework's container image. The image embeds the
 * benchmark app, which is started in local mode with its own setup skipped.
 */
export class DockerBenchmark {
  readonly parallelJobs: number;
  private readonly images: ImageManager;
  private readonly invoker: ContainerInvoker;

  private constructor(
    readonly framework: FrameworkDefinition,
    readonly benchmark: BenchmarkDefinition,
    parallelJobs: number,
    private readonly deps: DockerBenchmarkDeps
  ) {
    this.parallelJobs = clampParallelJobs(parallelJobs, deps.run.maxParallelJobs, deps.logger);
    this.images = new ImageManager({
      engine: deps.engine,
      settings: {
        frameworksDir: deps.run.frameworksDir,
        buildContextDir: deps.run.buildContextDir,
        script: deps.run.script
      },
      logger: deps.logger
    });
    this.invoker = new ContainerInvoker({
      engine: deps.engine,
      logger: deps.logger,
      inputReadOnly: deps.run.inputReadOnly
    });
  }

  static async create(
    frameworkName: string,
    benchmarkName: string,
    parallelJobs: number,
    deps: DockerBenchmarkDeps
  ): Promise<DockerBenchmark> {
    const framework = await deps.resolver.framework(frameworkName);
    const benchmark = await deps.resolver.benchmark(benchmarkName);
    return new DockerBenchmark(framework, benchmark, parallelJobs, deps);
  }

  get image(): ImageReference {
    return dockerImageName(this.framework);
  }

  async setup(mode: SetupMode, upload = false): Promise<SetupReport> {
    return this.images.setup({ framework: this.framework, mode, upload });
  }

  // Nothing to release: containers are started with --rm and the Dockerfile is kept for inspection.
  cleanup(): void {}

  async run(opts: RunOptions = {}): Promise<MergedResults> {
    const jobs = jobsForBenchmark(this.jobContext(), this.parallelJobs, this.deps.resolver.partitioner);
    return this.runAndMerge(jobs, null, opts);
  }

  async runOne(taskName: string, fold: FoldSelector, opts: RunOptions = {}): Promise<MergedResults> {
    const task = findTask(this.benchmark, taskName);
    const jobs = jobsForTask(this.jobContext(), task, fold, this.parallelJobs);
    return this.runAndMerge(jobs, task.name, opts);
  }

  private jobContext(): JobContext {
    return {
      framework: this.framework.name,
      benchmark: this.benchmark,
      image: this.image,
      inputDir: this.deps.run.inputDir,
      outputDir: this.deps.run.outputDir
    };
  }

  private async runAndMerge(jobs: Job[], taskName: string | null, opts: RunOptions): Promise<MergedResults> {
    const outcomes = await runJobs(jobs, { parallelJobs: this.parallelJobs, invoker: this.invoker, logger: this.deps.logger });
    this.deps.logger.debug("results from docker run (merged to other scores but not to global scores yet): %j", outcomes);
    return this.deps.merger.merge({
      runId: opts.runId ?? newRunId(),
      framework: this.framework.name,
      benchmark: this.benchmark.name,
      outcomes,
      taskName,
      saveScores: opts.saveScores ?? false
    });
  }
}
