import type { ColumnType, Generated, JSONColumnType } from "kysely";

type OptionalNullable<T> = ColumnType<T | null, T | null | undefined, T | null>;
type JsonObject = Record<string, unknown>;
type JsonNullable = JSONColumnType<JsonObject | null, JsonObject | null | undefined, JsonObject | null>;

export interface RunsTable {
  run_id: string;
  kind: string;
  framework: string;
  benchmark: OptionalNullable<string>;
  task: OptionalNullable<string>;
  image: string;
  status: string;
  parallel_jobs: ColumnType<number | null, number | null | undefined, number | null>;
  config_hash: string;
  params: JsonNullable;
  environment: JsonNullable;
  created_at: Generated<string>;
  started_at: OptionalNullable<string>;
  finished_at: OptionalNullable<string>;
  error: OptionalNullable<string>;
  result_json: JsonNullable;
}

export interface RunEventsTable {
  event_id: Generated<string>;
  run_id: string;
  ts: Generated<string>;
  kind: string;
  message: OptionalNullable<string>;
  data: JsonNullable;
}

export interface JobResultsTable {
  run_id: string;
  job_id: string;
  framework: string;
  benchmark: string;
  task: OptionalNullable<string>;
  status: string;
  exit_code: ColumnType<number | null, number | null | undefined, number | null>;
  error: OptionalNullable<string>;
  output: OptionalNullable<string>;
  started_at: string;
  finished_at: string;
}

export interface DB {
  runs: RunsTable;
  run_events: RunEventsTable;
  job_results: JobResultsTable;
}
