import { spawn } from "child_process";
import type { ExecutionResult } from "./types.js";

const MAX_CAPTURE_BYTES = 1024 * 1024;

interface CaptureState {
  bytes: number;
  truncated: boolean;
}

function appendLimited(chunks: Buffer[], chunk: Buffer, state: CaptureState, limit: number): void {
  if (state.truncated) return;
  const next = state.bytes + chunk.byteLength;
  if (next > limit) {
    const keep = Math.max(0, limit - state.bytes);
    if (keep > 0) chunks.push(chunk.subarray(0, keep));
    state.bytes = limit;
    state.truncated = true;
    return;
  }
  chunks.push(chunk);
  state.bytes = next;
}

export interface LocalProcessSpec {
  argv: string[];
  cwd?: string;
  env?: Record<string, string>;
}

export async function runLocalProcess(spec: LocalProcessSpec): Promise<ExecutionResult> {
  const [command, ...args] = spec.argv;
  if (!command) throw new Error("local_process argv must be non-empty");
  const startedAt = new Date().toISOString();

  const child = spawn(command, args, {
    cwd: spec.cwd,
    env: { ...process.env, ...spec.env },
    stdio: ["ignore", "pipe", "pipe"] as const
  });

  const stdoutChunks: Buffer[] = [];
  const stderrChunks: Buffer[] = [];
  const outputChunks: Buffer[] = [];
  const stdoutState: CaptureState = { bytes: 0, truncated: false };
  const stderrState: CaptureState = { bytes: 0, truncated: false };
  const outputState: CaptureState = { bytes: 0, truncated: false };

  child.stdout.on("data", (chunk: Buffer) => {
    appendLimited(stdoutChunks, chunk, stdoutState, MAX_CAPTURE_BYTES);
    appendLimited(outputChunks, chunk, outputState, 2 * MAX_CAPTURE_BYTES);
  });
  child.stderr.on("data", (chunk: Buffer) => {
    appendLimited(stderrChunks, chunk, stderrState, MAX_CAPTURE_BYTES);
    appendLimited(outputChunks, chunk, outputState, 2 * MAX_CAPTURE_BYTES);
  });

  const exitCode = await new Promise<number>((resolve, reject) => {
    child.on("error", reject);
    child.on("close", (code: number | null) => resolve(code ?? 1));
  });

  const finishedAt = new Date().toISOString();

  const stdout = Buffer.concat(stdoutChunks).toString("utf8") + (stdoutState.truncated ? "\n[stdout truncated]\n" : "");
  const stderr = Buffer.concat(stderrChunks).toString("utf8") + (stderrState.truncated ? "\n[stderr truncated]\n" : "");
  const output = Buffer.concat(outputChunks).toString("utf8") + (outputState.truncated ? "\n[output truncated]\n" : "");

  return { exitCode, stdout, stderr, output, startedAt, finishedAt };
}
