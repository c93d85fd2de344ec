export class DescriptorWriteError extends Error {
  constructor(
    readonly descriptorPath: string,
    cause: unknown
  ) {
    super(`unable to write build descriptor ${descriptorPath}: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause
    });
    this.name = "DescriptorWriteError";
  }
}

export class ImageBuildError extends Error {
  constructor(
    readonly image: string,
    readonly exitCode: number,
    readonly output: string
  ) {
    super(`docker build failed for ${image} (exit ${exitCode})${output.trim() ? `: ${output.trim()}` : ""}`);
    this.name = "ImageBuildError";
  }
}

export class ImagePublishError extends Error {
  constructor(
    readonly image: string,
    readonly step: "login" | "push",
    readonly exitCode: number,
    readonly output: string
  ) {
    super(`docker ${step} failed for ${image} (exit ${exitCode})${output.trim() ? `: ${output.trim()}` : ""}`);
    this.name = "ImagePublishError";
  }
}

export class ContainerRunError extends Error {
  constructor(
    readonly image: string,
    readonly exitCode: number,
    readonly output: string
  ) {
    super(`container ${image} exited with code ${exitCode}`);
    this.name = "ContainerRunError";
  }
}

export class UnknownDefinitionError extends Error {
  constructor(
    readonly kind: "framework" | "benchmark" | "task",
    readonly definitionName: string
  ) {
    super(`unknown ${kind}: ${definitionName}`);
    this.name = "UnknownDefinitionError";
  }
}
