import type { Logger } from "../core/logger.js";
import type { ContainerInvoker } from "../execution/docker/containerInvoker.js";
import type { Job, JobOutcome } from "./job.js";

/**
 * Runs jobs on at most `parallelJobs` concurrent workers. Outcomes keep the order of `jobs`; a
 * failed job never stops its siblings. There is no timeout: a hung container holds its worker.
 */
export async function runJobs(
  jobs: readonly Job[],
  opts: { parallelJobs: number; invoker: ContainerInvoker; logger: Logger }
): Promise<JobOutcome[]> {
  const outcomes: JobOutcome[] = new Array<JobOutcome>(jobs.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < jobs.length) {
      const index = next++;
      const job = jobs[index];
      if (!job) continue;
      opts.logger.info("starting job %s", job.id);
      const outcome = await job.execute(opts.invoker);
      if (outcome.status === "failed") {
        opts.logger.error("job %s failed: %s", job.id, outcome.error);
      } else {
        opts.logger.info("job %s completed", job.id);
      }
      outcomes[index] = outcome;
    }
  };

  const workers = Math.max(1, Math.min(opts.parallelJobs, jobs.length));
  await Promise.all(Array.from({ length: workers }, () => worker()));
  return outcomes;
}
