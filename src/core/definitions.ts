export interface DockerImageSpec {
  author: string;
  image?: string | null;
  tag: string;
}

export interface FrameworkDefinition {
  name: string;
  version?: string | null;
  dockerImage: DockerImageSpec;
  // Extra Dockerfile instructions run after the benchmark app's own dependencies are installed.
  dockerCommands?: string | null;
}

export interface TaskDefinition {
  name: string;
  folds: number;
}

export interface BenchmarkDefinition {
  name: string;
  tasks: TaskDefinition[];
}

export type ImageReference = `${string}/${string}:${string}`;

export function dockerImageName(framework: FrameworkDefinition): ImageReference {
  const di = framework.dockerImage;
  const image = di.image ? di.image : framework.name.toLowerCase();
  return `${di.author}/${image}:${di.tag}`;
}

export function taskFoldIds(task: TaskDefinition): number[] {
  return Array.from({ length: Math.max(0, task.folds) }, (_, i) => i);
}
