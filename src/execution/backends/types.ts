export interface ExecutionResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  // stdout and stderr interleaved in arrival order
  output: string;
  startedAt: string;
  finishedAt: string;
}

export interface VolumeMount {
  hostPath: string;
  containerPath: string;
  readOnly?: boolean;
}

export interface BuildImageSpec {
  dockerfile: string;
  image: string;
  contextDir: string;
  cache: boolean;
}

export interface RunContainerSpec {
  image: string;
  mounts: VolumeMount[];
  remove: boolean;
  args: string[];
}

/**
 * Narrow port over the container engine CLI. Orchestration code only talks to this, so the engine
 * can be swapped or faked without touching setup or run logic.
 */
export interface ContainerEngine {
  readonly bin: string;
  checkImage(image: string): Promise<boolean>;
  buildImage(spec: BuildImageSpec): Promise<ExecutionResult>;
  pushImage(image: string): Promise<ExecutionResult & { step: "login" | "push" }>;
  runContainer(spec: RunContainerSpec): Promise<ExecutionResult>;
  renderRunCommand(spec: RunContainerSpec): string;
}
