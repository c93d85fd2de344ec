import { taskFoldIds, type BenchmarkDefinition, type TaskDefinition } from "../core/definitions.js";
import { Job } from "./job.js";

export interface JobContext {
  framework: string;
  benchmark: BenchmarkDefinition;
  image: string;
  inputDir: string;
  outputDir: string;
}

export interface JobPartition {
  taskName: string;
  folds: number[];
}

/** Splits a benchmark into independently schedulable units. */
export type BenchmarkPartitioner = (benchmark: BenchmarkDefinition) => JobPartition[];

export const partitionByTaskFold: BenchmarkPartitioner = (benchmark) =>
  benchmark.tasks.flatMap((task) => taskFoldIds(task).map((fold) => ({ taskName: task.name, folds: [fold] })));

export const partitionByTask: BenchmarkPartitioner = (benchmark) =>
  benchmark.tasks.map((task) => ({ taskName: task.name, folds: [] }));

export type FoldSelector = number | readonly number[] | null | undefined;

export function makeJob(ctx: JobContext, taskName: string | null, folds: readonly number[]): Job {
  return new Job({
    framework: ctx.framework,
    benchmark: ctx.benchmark.name,
    taskName,
    folds,
    image: ctx.image,
    inputDir: ctx.inputDir,
    outputDir: ctx.outputDir
  });
}

export function jobsForBenchmark(
  ctx: JobContext,
  parallelJobs: number,
  partition: BenchmarkPartitioner = partitionByTaskFold
): Job[] {
  if (parallelJobs === 1) return [makeJob(ctx, null, [])];
  return partition(ctx.benchmark).map((p) => makeJob(ctx, p.taskName, p.folds));
}

// Requested folds in caller order with repeats dropped; `null` means none were named.
function requestedFolds(fold: FoldSelector): number[] | null {
  if (fold === null || fold === undefined) return null;
  if (typeof fold === "number") return [fold];
  return fold.length > 0 ? [...new Set(fold)] : null;
}

export function jobsForTask(ctx: JobContext, task: TaskDefinition, fold: FoldSelector, parallelJobs: number): Job[] {
  const folds = requestedFolds(fold);
  if (parallelJobs === 1 && (folds === null || folds.length > 1)) {
    return [makeJob(ctx, task.name, folds ?? [])];
  }
  return (folds ?? taskFoldIds(task)).map((f) => makeJob(ctx, task.name, [f]));
}
