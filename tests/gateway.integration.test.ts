import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, mkdir, rm } from "fs/promises";
import os from "os";
import path from "path";

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";

import type * as pg from "pg";

import { BenchConfig } from "../src/config/config.js";
import { isRunId } from "../src/core/ids.js";
import { openDatabase } from "../src/db/bootstrap.js";
import { createDb } from "../src/db/connection.js";
import { FileDefinitionResolver } from "../src/definitions/fileResolver.js";
import { createGatewayServer } from "../src/mcp/gatewayServer.js";
import { PostgresStore } from "../src/store/postgresStore.js";
import { FakeEngine, createMemoryLogger } from "./fakes.js";

interface ToolCallResult {
  isError: boolean;
  text: string;
  structured: Record<string, unknown>;
}

describe.sequential("gateway (stubbed docker)", () => {
  let tmpDir: string;
  let pool: pg.Pool;
  let store: PostgresStore;
  let engine: FakeEngine;
  let client: Client;
  let serverTransport: InMemoryTransport;
  let clientTransport: InMemoryTransport;

  async function callTool(name: string, args: Record<string, unknown>): Promise<ToolCallResult> {
    try {
      const res = await client.request({ method: "tools/call", params: { name, arguments: args } }, CallToolResultSchema);
      return {
        isError: res.isError === true,
        text: res.content.map((c) => (c.type === "text" ? c.text : c.type)).join("\n"),
        structured: res.structuredContent ?? {}
      };
    } catch (e) {
      return { isError: true, text: e instanceof Error ? e.message : String(e), structured: {} };
    }
  }

  async function mustCall(name: string, args: Record<string, unknown>): Promise<Record<string, unknown>> {
    const res = await callTool(name, args);
    if (res.isError) throw new Error(`${name} failed: ${res.text}`);
    return res.structured;
  }

  beforeAll(async () => {
    tmpDir = await mkdtemp(path.join(os.tmpdir(), "benchdock-gateway-"));
    await mkdir(path.join(tmpDir, "frameworks", "h2o"), { recursive: true });

    pool = await openDatabase({ schemaPath: path.resolve("db/schema.sql"), autoSchema: false });
    store = new PostgresStore(createDb(pool));

    const config = new BenchConfig({
      version: 1,
      run: {
        input_dir: path.join(tmpDir, "input"),
        output_dir: path.join(tmpDir, "output"),
        script: "runbenchmark.py",
        max_parallel_jobs: 2
      },
      docker: { frameworks_dir: path.join(tmpDir, "frameworks"), build_context_dir: tmpDir }
    });

    engine = new FakeEngine();
    engine.runBehaviour = (spec) => (spec.args.includes("iris") ? { exitCode: 1, output: "no data\n" } : { exitCode: 0, output: "ok\n" });

    const server = createGatewayServer({
      config,
      store,
      resolver: new FileDefinitionResolver(path.resolve("resources")),
      engine,
      logger: createMemoryLogger()
    });

    [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    client = new Client({ name: "benchdock-test-client", version: "0.0.0" });
    await client.connect(clientTransport);
  });

  afterAll(async () => {
    await clientTransport.close();
    await serverTransport.close();
    await pool.end();
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("resolves image references", async () => {
    const sc = await mustCall("image_reference", { framework: "H2O" });
    expect(sc).toEqual({ framework: "h2o", image: "benchdock/h2o:3.22" });
  });

  it("builds a missing image once and then reports it present", async () => {
    const built = await mustCall("image_setup", { framework: "h2o", mode: "auto" });
    expect(built.state).toBe("built");
    expect(built.dockerfile).toBe(path.join(tmpDir, "frameworks", "h2o", "Dockerfile"));

    const again = await mustCall("image_setup", { framework: "h2o", mode: "auto" });
    expect(again.state).toBe("present");
    expect(engine.builds).toHaveLength(1);

    const builtRunId = String(built.provenance_run_id);
    if (!isRunId(builtRunId)) throw new Error(`bad run id ${builtRunId}`);
    expect(await store.listRunEvents(builtRunId)).toEqual([
      { kind: "run.started", message: "setup h2o" },
      { kind: "image.setup", message: "benchdock/h2o:3.22 built" },
      { kind: "run.succeeded", message: "built" }
    ]);

    const runId = String(again.provenance_run_id);
    const got = await mustCall("run_get", { run_id: runId });
    expect(got.run).toMatchObject({ run_id: runId, kind: "setup", framework: "h2o", status: "succeeded", image: "benchdock/h2o:3.22" });
  });

  it("runs a benchmark in parallel and persists partial results", async () => {
    const sc = await mustCall("benchmark_run", { framework: "h2o", benchmark: "test", parallel_jobs: 2, save_scores: true });
    expect(sc).toMatchObject({ benchmark: "test", succeeded: 1, failed: 1, failed_jobs: ["docker_iris_0_h2o"], saved: true });

    const got = await mustCall("run_get", { run_id: String(sc.provenance_run_id) });
    expect(got.run).toMatchObject({ kind: "benchmark", status: "succeeded", parallel_jobs: 2 });
    expect(got.job_results).toEqual([
      { job_id: "docker_iris_0_h2o", status: "failed", exit_code: 1, error: "container benchdock/h2o:3.22 exited with code 1" },
      { job_id: "docker_kc2_0_h2o", status: "succeeded", exit_code: 0, error: null }
    ]);
  });

  it("runs a single task fold", async () => {
    const before = engine.runs.length;
    const sc = await mustCall("task_run", { framework: "h2o", benchmark: "test", task: "kc2", folds: [0] });
    expect(sc).toMatchObject({ task: "kc2", succeeded: 1, failed: 0, saved: false });
    expect(engine.runs.slice(before).map((r) => r.args.join(" "))).toEqual([
      "h2o test -t kc2 -f 0 -i /input -o /output -s skip"
    ]);
  });

  it("runs a repeated fold once and saves a single result row", async () => {
    const before = engine.runs.length;
    const sc = await mustCall("task_run", {
      framework: "h2o",
      benchmark: "test",
      task: "kc2",
      folds: [0, 0],
      parallel_jobs: 2,
      save_scores: true
    });
    expect(sc).toMatchObject({ task: "kc2", succeeded: 1, failed: 0, saved: true });
    expect(engine.runs.length - before).toBe(1);

    const got = await mustCall("run_get", { run_id: String(sc.provenance_run_id) });
    expect(got.run).toMatchObject({ kind: "task", status: "succeeded" });
    expect(got.job_results).toEqual([{ job_id: "docker_kc2_0_h2o", status: "succeeded", exit_code: 0, error: null }]);
  });

  it("fails unknown tasks", async () => {
    const res = await callTool("task_run", { framework: "h2o", benchmark: "test", task: "nope" });
    expect(res.isError).toBe(true);
    expect(res.text).toContain("unknown task: nope");
  });

  it("rejects unknown frameworks", async () => {
    const res = await callTool("benchmark_run", { framework: "missing", benchmark: "test" });
    expect(res.isError).toBe(true);
    expect(res.text).toContain("unknown framework: missing");
  });

  it("rejects malformed run ids", async () => {
    const res = await callTool("run_get", { run_id: "run_123" });
    expect(res.isError).toBe(true);
    expect(res.text).toContain("invalid run_id");
  });
});
