import type { RunId } from "./ids.js";
import type { JsonObject } from "./json.js";

export type RunKind = "setup" | "benchmark" | "task";

export type RunStatus = "running" | "succeeded" | "failed";

export interface RunRecord {
  runId: RunId;
  kind: RunKind;
  framework: string;
  benchmark: string | null;
  task: string | null;
  image: string;
  status: RunStatus;
  parallelJobs: number | null;
  configHash: `sha256:${string}`;
  params: JsonObject | null;
  environment: JsonObject | null;
  createdAt: string;
  startedAt: string | null;
  finishedAt: string | null;
  error: string | null;
  resultJson: JsonObject | null;
}

export interface JobResultRecord {
  runId: RunId;
  jobId: string;
  framework: string;
  benchmark: string;
  task: string | null;
  status: "succeeded" | "failed";
  exitCode: number | null;
  error: string | null;
  output: string | null;
  startedAt: string;
  finishedAt: string;
}
