import type { RunId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type { RunKind } from "../core/run.js";
import type { PostgresStore } from "../store/postgresStore.js";

export class BenchRun {
  readonly runId: RunId;

  constructor(
    private readonly store: PostgresStore,
    private readonly info: {
      runId: RunId;
      kind: RunKind;
      framework: string;
      benchmark: string | null;
      task: string | null;
      image: string;
      parallelJobs: number | null;
      configHash: `sha256:${string}`;
      params: JsonObject;
      environment: JsonObject | null;
    }
  ) {
    this.runId = info.runId;
  }

  async start(): Promise<void> {
    await this.store.createRun(this.info);
    const now = new Date().toISOString();
    await this.store.updateRun(this.runId, { startedAt: now });
    await this.event("run.started", `${this.info.kind} ${this.info.framework}`, {
      now,
      image: this.info.image,
      config_hash: this.info.configHash
    });
  }

  async event(kind: string, message: string, data: JsonObject | null): Promise<void> {
    await this.store.addRunEvent(this.runId, kind, message, data);
  }

  async finishSuccess(result: JsonObject, summary: string): Promise<JsonObject> {
    const withProvenance: JsonObject = { ...result, provenance_run_id: this.runId };
    await this.event("run.succeeded", summary, null);
    await this.store.updateRun(this.runId, {
      status: "succeeded",
      finishedAt: new Date().toISOString(),
      error: null,
      resultJson: withProvenance
    });
    return withProvenance;
  }

  async finishFailure(errorMessage: string): Promise<void> {
    await this.event("run.failed", `failed: ${errorMessage}`, { error: errorMessage });
    await this.store.updateRun(this.runId, {
      status: "failed",
      finishedAt: new Date().toISOString(),
      error: errorMessage
    });
  }
}
