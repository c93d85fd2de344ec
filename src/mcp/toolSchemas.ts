import * as z from "zod/v4";

const ulid26 = "[0-9A-HJKMNP-TV-Z]{26}";

export const zRunId = z.string().regex(new RegExp(`^run_${ulid26}$`), "invalid run_id");
export const zName = z.string().min(1).max(128);
export const zSetupMode = z.enum(["skip", "auto", "force"]);

export const zProvenance = z.object({
  provenance_run_id: zRunId
});

export const zJobSummary = z.object({
  job_id: z.string(),
  status: z.enum(["succeeded", "failed"]),
  exit_code: z.number().int().nullable(),
  error: z.string().nullable()
});

export const zMergedResults = z.object({
  run_id: zRunId,
  framework: z.string(),
  benchmark: z.string(),
  task: z.string().nullable(),
  succeeded: z.number().int(),
  failed: z.number().int(),
  failed_jobs: z.array(z.string()),
  saved: z.boolean(),
  jobs: z.array(zJobSummary)
});

export const zImageReferenceInput = z.object({
  framework: zName
});

export const zImageReferenceOutput = z.object({
  framework: z.string(),
  image: z.string()
});

export const zImageSetupInput = z.object({
  framework: zName,
  mode: zSetupMode.default("auto"),
  upload: z.boolean().default(false)
});

export const zImageSetupOutput = zProvenance.extend({
  image: z.string(),
  state: z.enum(["skipped", "present", "built", "published"]),
  dockerfile: z.string().nullable()
});

export const zBenchmarkRunInput = z.object({
  framework: zName,
  benchmark: zName,
  parallel_jobs: z.number().int().optional(),
  save_scores: z.boolean().default(false)
});

export const zBenchmarkRunOutput = zProvenance.extend(zMergedResults.shape);

export const zTaskRunInput = zBenchmarkRunInput.extend({
  task: zName,
  folds: z.array(z.number().int().min(0)).optional()
});

export const zTaskRunOutput = zBenchmarkRunOutput;

export const zRunGetInput = z.object({
  run_id: zRunId
});

export const zRunGetOutput = z.object({
  run: z.object({
    run_id: zRunId,
    kind: z.enum(["setup", "benchmark", "task"]),
    framework: z.string(),
    benchmark: z.string().nullable(),
    task: z.string().nullable(),
    image: z.string(),
    status: z.enum(["running", "succeeded", "failed"]),
    parallel_jobs: z.number().int().nullable(),
    config_hash: z.string(),
    created_at: z.string(),
    started_at: z.string().nullable(),
    finished_at: z.string().nullable(),
    error: z.string().nullable(),
    result: z.record(z.string(), z.unknown()).nullable()
  }),
  job_results: z.array(zJobSummary)
});
