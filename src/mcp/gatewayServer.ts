import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { DockerBenchmark } from "../benchmark/dockerBenchmark.js";
import type { BenchConfig } from "../config/config.js";
import { dockerImageName } from "../core/definitions.js";
import { UnknownDefinitionError } from "../core/errors.js";
import { isRunId, newRunId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type { Logger } from "../core/logger.js";
import type { RunKind } from "../core/run.js";
import type { DefinitionResolver } from "../definitions/resolver.js";
import type { ContainerEngine } from "../execution/backends/types.js";
import { ImageManager } from "../execution/docker/imageManager.js";
import { ScoreboardMerger, toResultJson } from "../results/scoreboard.js";
import { BenchRun } from "../runs/benchRun.js";
import type { PostgresStore } from "../store/postgresStore.js";
import { envSnapshot } from "./envSnapshot.js";
import {
  zBenchmarkRunInput,
  zBenchmarkRunOutput,
  zImageReferenceInput,
  zImageReferenceOutput,
  zImageSetupInput,
  zImageSetupOutput,
  zRunGetInput,
  zRunGetOutput,
  zTaskRunInput,
  zTaskRunOutput
} from "./toolSchemas.js";

export interface GatewayDeps {
  config: BenchConfig;
  store: PostgresStore;
  resolver: DefinitionResolver;
  engine: ContainerEngine;
  logger: Logger;
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function toMcpError(e: unknown): McpError {
  if (e instanceof McpError) return e;
  if (e instanceof UnknownDefinitionError) return new McpError(ErrorCode.InvalidParams, e.message);
  return new McpError(ErrorCode.InternalError, errorMessage(e));
}

export function createGatewayServer(deps: GatewayDeps): McpServer {
  const mcp = new McpServer({
    name: "benchdock-gateway",
    version: "0.1.0"
  });

  const runConfig = deps.config.runConfiguration();
  const merger = new ScoreboardMerger({ store: deps.store, logger: deps.logger });
  const benchmarkDeps = { run: runConfig, resolver: deps.resolver, engine: deps.engine, merger, logger: deps.logger };

  // Runs `body` under a recorded BenchRun; failures mark the run failed before surfacing as McpError.
  async function recorded(
    info: { kind: RunKind; framework: string; benchmark: string | null; task: string | null; image: string; parallelJobs: number | null; params: JsonObject },
    body: (run: BenchRun) => Promise<{ result: JsonObject; summary: string }>
  ): Promise<JsonObject> {
    const run = new BenchRun(deps.store, {
      ...info,
      runId: newRunId(),
      configHash: deps.config.configHash,
      environment: envSnapshot(deps.engine.bin)
    });
    await run.start();
    try {
      const { result, summary } = await body(run);
      return await run.finishSuccess(result, summary);
    } catch (e) {
      await run.finishFailure(errorMessage(e));
      throw toMcpError(e);
    }
  }

  mcp.registerTool(
    "image_reference",
    {
      description: "Resolve the container image reference ({author}/{image}:{tag}) of a framework.",
      inputSchema: zImageReferenceInput,
      outputSchema: zImageReferenceOutput
    },
    async (args) => {
      try {
        const framework = await deps.resolver.framework(args.framework);
        const image = dockerImageName(framework);
        return {
          content: [{ type: "text", text: image }],
          structuredContent: { framework: framework.name, image }
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "image_setup",
    {
      description: "Prepare a framework's docker image: skip, build when missing (auto), or rebuild without cache (force).",
      inputSchema: zImageSetupInput,
      outputSchema: zImageSetupOutput
    },
    async (args) => {
      try {
        const framework = await deps.resolver.framework(args.framework);
        const image = dockerImageName(framework);
        const images = new ImageManager({
          engine: deps.engine,
          settings: {
            frameworksDir: runConfig.frameworksDir,
            buildContextDir: runConfig.buildContextDir,
            script: runConfig.script
          },
          logger: deps.logger
        });

        const structured = await recorded(
          {
            kind: "setup",
            framework: framework.name,
            benchmark: null,
            task: null,
            image,
            parallelJobs: null,
            params: { mode: args.mode, upload: args.upload }
          },
          async (run) => {
            const report = await images.setup({ framework, mode: args.mode, upload: args.upload });
            await run.event("image.setup", `${report.image} ${report.state}`, { dockerfile: report.dockerfile });
            return {
              result: { image: report.image, state: report.state, dockerfile: report.dockerfile },
              summary: report.state
            };
          }
        );

        return {
          content: [{ type: "text", text: `Image ${image}: ${String(structured.state)}` }],
          structuredContent: structured
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "benchmark_run",
    {
      description: "Run a whole benchmark for a framework in docker. One container when parallel_jobs is 1, else one per task and fold.",
      inputSchema: zBenchmarkRunInput,
      outputSchema: zBenchmarkRunOutput
    },
    async (args) => {
      try {
        const bench = await DockerBenchmark.create(
          args.framework,
          args.benchmark,
          args.parallel_jobs ?? runConfig.defaultParallelJobs,
          benchmarkDeps
        );

        const structured = await recorded(
          {
            kind: "benchmark",
            framework: bench.framework.name,
            benchmark: bench.benchmark.name,
            task: null,
            image: bench.image,
            parallelJobs: bench.parallelJobs,
            params: { save_scores: args.save_scores }
          },
          async (run) => {
            const merged = await bench.run({ saveScores: args.save_scores, runId: run.runId });
            return { result: toResultJson(merged), summary: `${merged.succeeded} succeeded, ${merged.failed} failed` };
          }
        );

        return {
          content: [{ type: "text", text: `Ran ${args.benchmark} with ${args.framework}: ${String(structured.failed)} failed` }],
          structuredContent: structured
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "task_run",
    {
      description: "Run one task of a benchmark in docker, optionally restricted to some folds.",
      inputSchema: zTaskRunInput,
      outputSchema: zTaskRunOutput
    },
    async (args) => {
      try {
        const bench = await DockerBenchmark.create(
          args.framework,
          args.benchmark,
          args.parallel_jobs ?? runConfig.defaultParallelJobs,
          benchmarkDeps
        );

        const structured = await recorded(
          {
            kind: "task",
            framework: bench.framework.name,
            benchmark: bench.benchmark.name,
            task: args.task,
            image: bench.image,
            parallelJobs: bench.parallelJobs,
            params: { folds: args.folds ?? null, save_scores: args.save_scores }
          },
          async (run) => {
            const merged = await bench.runOne(args.task, args.folds ?? null, {
              saveScores: args.save_scores,
              runId: run.runId
            });
            return { result: toResultJson(merged), summary: `${merged.succeeded} succeeded, ${merged.failed} failed` };
          }
        );

        return {
          content: [{ type: "text", text: `Ran ${args.task} with ${args.framework}: ${String(structured.failed)} failed` }],
          structuredContent: structured
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "run_get",
    {
      description: "Fetch a recorded setup or run, with its persisted job results.",
      inputSchema: zRunGetInput,
      outputSchema: zRunGetOutput
    },
    async (args) => {
      const runId = args.run_id;
      if (!isRunId(runId)) throw new McpError(ErrorCode.InvalidParams, `invalid run_id: ${runId}`);
      const run = await deps.store.getRun(runId);
      if (!run) throw new McpError(ErrorCode.InvalidParams, `unknown run_id: ${runId}`);
      const jobs = await deps.store.listJobResults(runId);

      return {
        content: [{ type: "text", text: `Run ${run.runId}: ${run.status}` }],
        structuredContent: {
          run: {
            run_id: run.runId,
            kind: run.kind,
            framework: run.framework,
            benchmark: run.benchmark,
            task: run.task,
            image: run.image,
            status: run.status,
            parallel_jobs: run.parallelJobs,
            config_hash: run.configHash,
            created_at: run.createdAt,
            started_at: run.startedAt,
            finished_at: run.finishedAt,
            error: run.error,
            result: run.resultJson
          },
          job_results: jobs.map((j) => ({ job_id: j.jobId, status: j.status, exit_code: j.exitCode, error: j.error }))
        }
      };
    }
  );

  return mcp;
}
