import { ulid } from "ulid";

export type RunId = `run_${string}`;

export function newRunId(): RunId {
  return `run_${ulid()}` as const;
}

export function isRunId(value: string): value is RunId {
  return /^run_[0-9A-HJKMNP-TV-Z]{26}$/.test(value);
}
