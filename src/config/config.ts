import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import * as z from "zod/v4";
import { sha256Prefixed, stableJsonStringify } from "../core/canonicalJson.js";
import type { Logger } from "../core/logger.js";

export const zBenchConfigFile = z.object({
  version: z.literal(1),
  run: z.object({
    input_dir: z.string().min(1),
    output_dir: z.string().min(1),
    script: z.string().min(1),
    max_parallel_jobs: z.number().int().min(1),
    parallel_jobs: z.number().int().optional()
  }),
  docker: z.object({
    bin: z.string().min(1).optional(),
    frameworks_dir: z.string().min(1),
    build_context_dir: z.string().min(1),
    input_read_only: z.boolean().optional()
  }),
  resources: z
    .object({
      dir: z.string().min(1)
    })
    .optional()
});

export type BenchConfigFile = z.infer<typeof zBenchConfigFile>;

export interface RunConfiguration {
  inputDir: string;
  outputDir: string;
  script: string;
  maxParallelJobs: number;
  // As configured; corrected into [1, maxParallelJobs] when a benchmark is created.
  defaultParallelJobs: number;
  frameworksDir: string;
  buildContextDir: string;
  inputReadOnly: boolean;
}

function expandEnvToken(value: string): string {
  const trimmed = value.trim();
  const m = /^\$\{([A-Z0-9_]+)\}$/.exec(trimmed) ?? /^\$([A-Z0-9_]+)$/.exec(trimmed);
  if (!m) return value;
  const varName = m[1];
  if (!varName) return value;
  const v = process.env[varName]?.trim();
  if (!v) throw new Error(`config references unset environment variable ${varName}`);
  return v;
}

function expandConfigEnv(config: BenchConfigFile): BenchConfigFile {
  return {
    ...config,
    run: {
      ...config.run,
      input_dir: process.env.BENCHDOCK_INPUT_DIR?.trim() || expandEnvToken(config.run.input_dir),
      output_dir: process.env.BENCHDOCK_OUTPUT_DIR?.trim() || expandEnvToken(config.run.output_dir)
    },
    docker: {
      ...config.docker,
      frameworks_dir: expandEnvToken(config.docker.frameworks_dir),
      build_context_dir: expandEnvToken(config.docker.build_context_dir)
    },
    resources: config.resources ? { dir: expandEnvToken(config.resources.dir) } : undefined
  };
}

/**
 * Corrects a requested concurrency into `[1, max]`; anything outside it (0, negatives, values over
 * the ceiling, non-integers) becomes the ceiling, never an error.
 */
export function clampParallelJobs(requested: number, maxParallelJobs: number, logger?: Logger): number {
  if (Number.isInteger(requested) && requested >= 1 && requested <= maxParallelJobs) return requested;
  logger?.warn("forcing parallelization to its upper limit: %s", maxParallelJobs);
  return maxParallelJobs;
}

export class BenchConfig {
  readonly configHash: `sha256:${string}`;

  constructor(
    private readonly config: BenchConfigFile,
    private readonly baseDir: string = process.cwd()
  ) {
    this.configHash = sha256Prefixed(stableJsonStringify(config));
  }

  static async loadFromFile(filePath: string): Promise<BenchConfig> {
    const raw = await fs.readFile(filePath, "utf8");
    const parsed = zBenchConfigFile.safeParse(YAML.parse(raw));
    if (!parsed.success) {
      throw new Error(`invalid config at ${filePath}: ${z.prettifyError(parsed.error)}`);
    }
    return new BenchConfig(expandConfigEnv(parsed.data), path.dirname(path.resolve(filePath)));
  }

  private resolveDir(dir: string): string {
    return path.resolve(this.baseDir, dir);
  }

  engineBin(): string {
    return this.config.docker.bin ?? "docker";
  }

  resourcesDir(): string {
    return this.resolveDir(this.config.resources?.dir ?? "../resources");
  }

  runConfiguration(): RunConfiguration {
    const max = this.config.run.max_parallel_jobs;
    return {
      inputDir: this.resolveDir(this.config.run.input_dir),
      outputDir: this.resolveDir(this.config.run.output_dir),
      script: this.config.run.script,
      maxParallelJobs: max,
      defaultParallelJobs: this.config.run.parallel_jobs ?? 1,
      frameworksDir: this.resolveDir(this.config.docker.frameworks_dir),
      buildContextDir: this.resolveDir(this.config.docker.build_context_dir),
      inputReadOnly: this.config.docker.input_read_only ?? true
    };
  }
}
