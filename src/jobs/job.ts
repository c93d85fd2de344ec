import { ContainerRunError } from "../core/errors.js";
import type { ContainerInvoker } from "../execution/docker/containerInvoker.js";

export interface JobParams {
  framework: string;
  benchmark: string;
  // null runs the whole benchmark inside one container
  taskName: string | null;
  // empty means every fold of the selected task(s)
  folds: readonly number[];
  image: string;
  inputDir: string;
  outputDir: string;
}

export type JobStatus = "succeeded" | "failed";

export interface JobOutcome {
  jobId: string;
  status: JobStatus;
  output: string | null;
  error: string | null;
  exitCode: number | null;
  startedAt: string;
  finishedAt: string;
}

export function deriveJobId(params: Pick<JobParams, "framework" | "benchmark" | "taskName" | "folds">): string {
  const target = params.taskName ?? params.benchmark;
  return `docker_${target}_${params.folds.join(":")}_${params.framework}`;
}

/** `<framework> <benchmark> [-t <task>] [-f <fold>...]`, as the benchmark app's CLI expects it. */
export function scriptParams(params: Pick<JobParams, "framework" | "benchmark" | "taskName" | "folds">): string[] {
  const out = [params.framework, params.benchmark];
  if (params.taskName !== null) out.push("-t", params.taskName);
  if (params.folds.length > 0) out.push("-f", ...params.folds.map(String));
  return out;
}

export class Job {
  readonly id: string;
  readonly params: Readonly<JobParams>;

  constructor(params: JobParams) {
    this.params = Object.freeze({ ...params, folds: Object.freeze([...params.folds]) });
    this.id = deriveJobId(this.params);
  }

  scriptParams(): string[] {
    return scriptParams(this.params);
  }

  commandLine(): string {
    return this.scriptParams().join(" ");
  }

  /** Never throws: a failing container becomes a `failed` outcome for this job only. */
  async execute(invoker: ContainerInvoker): Promise<JobOutcome> {
    const startedAt = new Date().toISOString();
    try {
      const output = await invoker.run(this.params.image, this.params.inputDir, this.params.outputDir, this.scriptParams());
      return {
        jobId: this.id,
        status: "succeeded",
        output,
        error: null,
        exitCode: 0,
        startedAt,
        finishedAt: new Date().toISOString()
      };
    } catch (e) {
      return {
        jobId: this.id,
        status: "failed",
        output: e instanceof ContainerRunError ? e.output : null,
        error: e instanceof Error ? e.message : String(e),
        exitCode: e instanceof ContainerRunError ? e.exitCode : null,
        startedAt,
        finishedAt: new Date().toISOString()
      };
    }
  }
}
