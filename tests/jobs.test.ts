import { describe, it, expect } from "vitest";
import type { BenchmarkDefinition } from "../src/core/definitions.js";
import { ContainerInvoker } from "../src/execution/docker/containerInvoker.js";
import { Job, deriveJobId } from "../src/jobs/job.js";
import { jobsForBenchmark, jobsForTask, partitionByTask, type JobContext } from "../src/jobs/jobFactory.js";
import { runJobs } from "../src/jobs/jobRunner.js";
import { FakeEngine, createMemoryLogger } from "./fakes.js";

const benchmark: BenchmarkDefinition = {
  name: "small",
  tasks: [
    { name: "t1", folds: 2 },
    { name: "t2", folds: 3 }
  ]
};

const ctx: JobContext = {
  framework: "h2o",
  benchmark,
  image: "org/h2o:stable",
  inputDir: "/data/in",
  outputDir: "/data/out"
};

const t1 = { name: "t1", folds: 2 };

function only(jobs: Job[]): Job {
  const [job] = jobs;
  if (!job || jobs.length !== 1) throw new Error(`expected exactly one job, got ${jobs.length}`);
  return job;
}

describe("job factory", () => {
  it("runs the whole benchmark in one job when parallel_jobs is 1", () => {
    const jobs = jobsForBenchmark(ctx, 1);
    expect(jobs).toHaveLength(1);
    expect(jobs[0]?.id).toBe("docker_small__h2o");
    expect(jobs[0]?.commandLine()).toBe("h2o small");
  });

  it("splits a benchmark per task and fold for parallel runs", () => {
    const jobs = jobsForBenchmark(ctx, 3);
    expect(jobs.map((j) => j.id)).toEqual([
      "docker_t1_0_h2o",
      "docker_t1_1_h2o",
      "docker_t2_0_h2o",
      "docker_t2_1_h2o",
      "docker_t2_2_h2o"
    ]);
    expect(jobs[4]?.commandLine()).toBe("h2o small -t t2 -f 2");
  });

  it("delegates partitioning to the supplied partitioner", () => {
    const jobs = jobsForBenchmark(ctx, 2, partitionByTask);
    expect(jobs.map((j) => j.commandLine())).toEqual(["h2o small -t t1", "h2o small -t t2"]);
  });

  it("keeps all requested folds together in one sequential job", () => {
    const all = jobsForTask(ctx, t1, null, 1);
    expect(all.map((j) => j.commandLine())).toEqual(["h2o small -t t1"]);

    const empty = jobsForTask(ctx, t1, [], 1);
    expect(empty.map((j) => j.id)).toEqual(["docker_t1__h2o"]);

    const two = jobsForTask(ctx, t1, [0, 1], 1);
    expect(two).toHaveLength(1);
    expect(two[0]?.id).toBe("docker_t1_0:1_h2o");
    expect(two[0]?.commandLine()).toBe("h2o small -t t1 -f 0 1");
  });

  it("creates one job for a single named fold", () => {
    const jobs = jobsForTask(ctx, t1, 0, 1);
    expect(jobs).toHaveLength(1);
    expect(jobs[0]?.scriptParams()).toEqual(["h2o", "small", "-t", "t1", "-f", "0"]);
    expect(jobs[0]?.commandLine()).toContain("-f 0");

    expect(jobsForTask(ctx, t1, [1], 1).map((j) => j.id)).toEqual(["docker_t1_1_h2o"]);
  });

  it("creates one job per fold for parallel runs", () => {
    expect(jobsForTask(ctx, t1, null, 2).map((j) => j.id)).toEqual(["docker_t1_0_h2o", "docker_t1_1_h2o"]);
    expect(jobsForTask(ctx, t1, [1, 0], 4).map((j) => j.id)).toEqual(["docker_t1_1_h2o", "docker_t1_0_h2o"]);
  });

  it("gives distinct ids to the same task with different fold subsets", () => {
    const a = jobsForTask(ctx, t1, [0], 1)[0];
    const b = jobsForTask(ctx, t1, [1], 1)[0];
    expect(a?.id).not.toBe(b?.id);
  });

  it("drops repeated folds so job ids stay unique", () => {
    expect(jobsForTask(ctx, t1, [0, 0], 2).map((j) => j.id)).toEqual(["docker_t1_0_h2o"]);
    expect(jobsForTask(ctx, t1, [1, 0, 1], 4).map((j) => j.id)).toEqual(["docker_t1_1_h2o", "docker_t1_0_h2o"]);
    expect(jobsForTask(ctx, t1, [0, 0], 1).map((j) => j.commandLine())).toEqual(["h2o small -t t1 -f 0"]);
    expect(jobsForTask(ctx, t1, [1, 0, 1], 1).map((j) => j.id)).toEqual(["docker_t1_1:0_h2o"]);
  });
});

describe("Job", () => {
  it("copies and freezes its parameters", () => {
    const folds = [0, 1];
    const job = new Job({ ...ctx, benchmark: "small", taskName: "t1", folds });
    folds.push(2);
    expect(job.params.folds).toEqual([0, 1]);
    expect(Object.isFrozen(job.params)).toBe(true);
    expect(job.id).toBe(deriveJobId({ framework: "h2o", benchmark: "small", taskName: "t1", folds: [0, 1] }));
  });

  it("invokes the container with fixed mounts and setup skipped", async () => {
    const engine = new FakeEngine();
    const logger = createMemoryLogger();
    const invoker = new ContainerInvoker({ engine, logger });
    const outcome = await only(jobsForBenchmark(ctx, 1)).execute(invoker);

    expect(outcome).toMatchObject({ jobId: "docker_small__h2o", status: "succeeded", output: "ok\n", exitCode: 0, error: null });
    expect(engine.runs).toEqual([
      {
        image: "org/h2o:stable",
        mounts: [
          { hostPath: "/data/in", containerPath: "/input", readOnly: true },
          { hostPath: "/data/out", containerPath: "/output", readOnly: false }
        ],
        remove: true,
        args: ["h2o", "small", "-i", "/input", "-o", "/output", "-s", "skip"]
      }
    ]);
    expect(logger.lines.filter((l) => l.level === "info").map((l) => l.message)).toEqual([
      "Starting docker: docker run -v /data/in:/input:ro -v /data/out:/output --rm org/h2o:stable h2o small -i /input -o /output -s skip",
      "Datasets are loaded by default from folder /data/in",
      "Generated files will be available in folder /data/out"
    ]);
  });

  it("records a non-zero container exit as a failed outcome", async () => {
    const engine = new FakeEngine();
    engine.runBehaviour = () => ({ exitCode: 3, output: "boom\n" });
    const invoker = new ContainerInvoker({ engine, logger: createMemoryLogger() });
    const outcome = await only(jobsForTask(ctx, t1, 0, 1)).execute(invoker);

    expect(outcome).toMatchObject({
      jobId: "docker_t1_0_h2o",
      status: "failed",
      exitCode: 3,
      output: "boom\n",
      error: "container org/h2o:stable exited with code 3"
    });
  });
});

describe("runJobs", () => {
  it("bounds concurrency and keeps outcome order", async () => {
    const engine = new FakeEngine();
    const invoker = new ContainerInvoker({ engine, logger: createMemoryLogger() });
    const jobs = jobsForBenchmark(ctx, 2);
    const outcomes = await runJobs(jobs, { parallelJobs: 2, invoker, logger: createMemoryLogger() });

    expect(outcomes.map((o) => o.jobId)).toEqual(jobs.map((j) => j.id));
    expect(engine.runs).toHaveLength(5);
    expect(engine.maxConcurrentRuns).toBe(2);
  });

  it("keeps running sibling jobs after one fails", async () => {
    const engine = new FakeEngine();
    engine.runBehaviour = (spec) => (spec.args.includes("t2") ? { exitCode: 1, output: "failed\n" } : { exitCode: 0, output: "ok\n" });
    const invoker = new ContainerInvoker({ engine, logger: createMemoryLogger() });
    const logger = createMemoryLogger();
    const outcomes = await runJobs(jobsForBenchmark(ctx, 4), { parallelJobs: 4, invoker, logger });

    expect(outcomes.map((o) => o.status)).toEqual(["succeeded", "succeeded", "failed", "failed", "failed"]);
    expect(logger.lines.filter((l) => l.level === "error").map((l) => l.message)).toEqual([
      "job docker_t2_0_h2o failed: container org/h2o:stable exited with code 1",
      "job docker_t2_1_h2o failed: container org/h2o:stable exited with code 1",
      "job docker_t2_2_h2o failed: container org/h2o:stable exited with code 1"
    ]);
  });
});
