import type { BenchmarkDefinition, FrameworkDefinition, TaskDefinition } from "../core/definitions.js";
import { UnknownDefinitionError } from "../core/errors.js";
import type { BenchmarkPartitioner } from "../jobs/jobFactory.js";

export interface DefinitionResolver {
  framework(name: string): Promise<FrameworkDefinition>;
  benchmark(name: string): Promise<BenchmarkDefinition>;
  // When absent, multi-job benchmark runs are split per task and fold.
  partitioner?: BenchmarkPartitioner;
}

export function findTask(benchmark: BenchmarkDefinition, taskName: string): TaskDefinition {
  const task = benchmark.tasks.find((t) => t.name.toLowerCase() === taskName.toLowerCase());
  if (!task) throw new UnknownDefinitionError("task", taskName);
  return task;
}

export class StaticDefinitionResolver implements DefinitionResolver {
  constructor(
    private readonly frameworks: FrameworkDefinition[],
    private readonly benchmarks: BenchmarkDefinition[],
    readonly partitioner?: BenchmarkPartitioner
  ) {}

  async framework(name: string): Promise<FrameworkDefinition> {
    const found = this.frameworks.find((f) => f.name.toLowerCase() === name.toLowerCase());
    if (!found) throw new UnknownDefinitionError("framework", name);
    return found;
  }

  async benchmark(name: string): Promise<BenchmarkDefinition> {
    const found = this.benchmarks.find((b) => b.name === name);
    if (!found) throw new UnknownDefinitionError("benchmark", name);
    return found;
  }
}
