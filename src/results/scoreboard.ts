import type { RunId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type { Logger } from "../core/logger.js";
import type { JobOutcome } from "../jobs/job.js";
import type { JobResultStore } from "../store/postgresStore.js";

export interface MergeRequest {
  runId: RunId;
  framework: string;
  benchmark: string;
  outcomes: JobOutcome[];
  // set when the run targeted a single task
  taskName: string | null;
  saveScores: boolean;
}

export interface MergedResults {
  runId: RunId;
  framework: string;
  benchmark: string;
  taskName: string | null;
  succeeded: number;
  failed: number;
  failedJobs: string[];
  jobs: JobOutcome[];
  saved: boolean;
}

export interface ResultMerger {
  merge(request: MergeRequest): Promise<MergedResults>;
}

export function toResultJson(merged: MergedResults): JsonObject {
  return {
    run_id: merged.runId,
    framework: merged.framework,
    benchmark: merged.benchmark,
    task: merged.taskName,
    succeeded: merged.succeeded,
    failed: merged.failed,
    failed_jobs: merged.failedJobs,
    saved: merged.saved,
    jobs: merged.jobs.map((j) => ({
      job_id: j.jobId,
      status: j.status,
      exit_code: j.exitCode,
      error: j.error
    }))
  };
}

/**
 * Collects per-job outcomes into one result set and, when asked, persists them. No scoring happens
 * here; each outcome stays attached to the job that produced it.
 */
export class ScoreboardMerger implements ResultMerger {
  constructor(
    private readonly deps: {
      store: JobResultStore;
      logger: Logger;
    }
  ) {}

  async merge(request: MergeRequest): Promise<MergedResults> {
    const failedJobs = request.outcomes.filter((o) => o.status === "failed").map((o) => o.jobId);
    const merged: MergedResults = {
      runId: request.runId,
      framework: request.framework,
      benchmark: request.benchmark,
      taskName: request.taskName,
      succeeded: request.outcomes.length - failedJobs.length,
      failed: failedJobs.length,
      failedJobs,
      jobs: request.outcomes,
      saved: false
    };

    if (failedJobs.length) {
      this.deps.logger.warn("%d of %d jobs failed: %s", failedJobs.length, request.outcomes.length, failedJobs.join(", "));
    }

    if (request.saveScores) {
      await this.deps.store.saveJobResults(
        request.outcomes.map((o) => ({
          runId: request.runId,
          jobId: o.jobId,
          framework: request.framework,
          benchmark: request.benchmark,
          task: request.taskName,
          status: o.status,
          exitCode: o.exitCode,
          error: o.error,
          output: o.output,
          startedAt: o.startedAt,
          finishedAt: o.finishedAt
        }))
      );
      merged.saved = true;
    }

    return merged;
  }
}
