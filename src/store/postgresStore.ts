import type { Kysely, Selectable } from "kysely";
import type { RunId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type { JobResultRecord, RunKind, RunRecord, RunStatus } from "../core/run.js";
import type { DB } from "../db/types.js";

function toIso(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "string") return value;
  return new Date(String(value)).toISOString();
}

function toIsoOrNull(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  return toIso(value);
}

export interface JobResultStore {
  saveJobResults(rows: JobResultRecord[]): Promise<void>;
}

export class PostgresStore implements JobResultStore {
  constructor(private readonly db: Kysely<DB>) {}

  async createRun(input: {
    runId: RunId;
    kind: RunKind;
    framework: string;
    benchmark: string | null;
    task: string | null;
    image: string;
    parallelJobs: number | null;
    configHash: `sha256:${string}`;
    params: JsonObject | null;
    environment: JsonObject | null;
  }): Promise<RunRecord> {
    await this.db
      .insertInto("runs")
      .values({
        run_id: input.runId,
        kind: input.kind,
        framework: input.framework,
        benchmark: input.benchmark,
        task: input.task,
        image: input.image,
        status: "running",
        parallel_jobs: input.parallelJobs,
        config_hash: input.configHash,
        params: input.params,
        environment: input.environment
      })
      .execute();

    const row = await this.db
      .selectFrom("runs")
      .selectAll()
      .where("run_id", "=", input.runId)
      .executeTakeFirstOrThrow();
    return this.mapRun(row);
  }

  async getRun(runId: RunId): Promise<RunRecord | null> {
    const row = await this.db.selectFrom("runs").selectAll().where("run_id", "=", runId).executeTakeFirst();
    return row ? this.mapRun(row) : null;
  }

  async updateRun(
    runId: RunId,
    patch: Partial<Pick<RunRecord, "status" | "startedAt" | "finishedAt" | "error" | "resultJson">>
  ): Promise<void> {
    const updates: Record<string, unknown> = {};
    if (patch.status) updates.status = patch.status;
    if (patch.startedAt !== undefined) updates.started_at = patch.startedAt;
    if (patch.finishedAt !== undefined) updates.finished_at = patch.finishedAt;
    if (patch.error !== undefined) updates.error = patch.error;
    if (patch.resultJson !== undefined) updates.result_json = patch.resultJson;

    if (Object.keys(updates).length === 0) return;

    await this.db.updateTable("runs").set(updates).where("run_id", "=", runId).execute();
  }

  async addRunEvent(runId: RunId, kind: string, message: string | null, data: JsonObject | null): Promise<void> {
    await this.db
      .insertInto("run_events")
      .values({ run_id: runId, kind, message, data: data ?? null })
      .execute();
  }

  async listRunEvents(runId: RunId): Promise<Array<{ kind: string; message: string | null }>> {
    const rows = await this.db
      .selectFrom("run_events")
      .select(["kind", "message"])
      .where("run_id", "=", runId)
      .orderBy("event_id", "asc")
      .execute();
    return rows.map((r) => ({ kind: r.kind, message: r.message }));
  }

  async saveJobResults(rows: JobResultRecord[]): Promise<void> {
    if (!rows.length) return;
    await this.db
      .insertInto("job_results")
      .values(
        rows.map((r) => ({
          run_id: r.runId,
          job_id: r.jobId,
          framework: r.framework,
          benchmark: r.benchmark,
          task: r.task,
          status: r.status,
          exit_code: r.exitCode,
          error: r.error,
          output: r.output,
          started_at: r.startedAt,
          finished_at: r.finishedAt
        }))
      )
      .execute();
  }

  async listJobResults(runId: RunId): Promise<JobResultRecord[]> {
    const rows = await this.db
      .selectFrom("job_results")
      .selectAll()
      .where("run_id", "=", runId)
      .orderBy("job_id", "asc")
      .execute();
    return rows.map((row) => ({
      runId: row.run_id as RunId,
      jobId: row.job_id,
      framework: row.framework,
      benchmark: row.benchmark,
      task: row.task,
      status: row.status === "succeeded" ? "succeeded" : "failed",
      exitCode: row.exit_code,
      error: row.error,
      output: row.output,
      startedAt: toIso((row as unknown as { started_at: unknown }).started_at),
      finishedAt: toIso((row as unknown as { finished_at: unknown }).finished_at)
    }));
  }

  private mapRun(row: Selectable<DB["runs"]>): RunRecord {
    return {
      runId: row.run_id as RunId,
      kind: row.kind as RunKind,
      framework: row.framework,
      benchmark: row.benchmark,
      task: row.task,
      image: row.image,
      status: row.status as RunStatus,
      parallelJobs: row.parallel_jobs,
      configHash: row.config_hash as `sha256:${string}`,
      params: row.params ? (row.params as JsonObject) : null,
      environment: row.environment ? (row.environment as JsonObject) : null,
      createdAt: toIso((row as unknown as { created_at: unknown }).created_at),
      startedAt: toIsoOrNull((row as unknown as { started_at: unknown }).started_at),
      finishedAt: toIsoOrNull((row as unknown as { finished_at: unknown }).finished_at),
      error: row.error,
      resultJson: row.result_json ? (row.result_json as JsonObject) : null
    };
  }
}
