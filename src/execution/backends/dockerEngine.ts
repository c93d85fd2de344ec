import type { BuildImageSpec, ContainerEngine, ExecutionResult, RunContainerSpec } from "./types.js";
import { runLocalProcess } from "./localProcess.js";

/**
 * `docker images -q` prints one hex id per matching image. Anything else (empty output, an error
 * message) means the image is absent.
 */
export function parseImageId(output: string): string | null {
  const trimmed = output.trim();
  return /^[0-9a-f]+$/.test(trimmed) ? trimmed : null;
}

export function imagesQueryArgs(image: string): string[] {
  return ["images", "-q", image];
}

export function buildArgs(spec: BuildImageSpec): string[] {
  const args = ["build"];
  if (!spec.cache) args.push("--no-cache");
  args.push("-t", spec.image, "-f", spec.dockerfile, spec.contextDir);
  return args;
}

export function runArgs(spec: RunContainerSpec): string[] {
  const args = ["run"];
  for (const m of spec.mounts) {
    args.push("-v", `${m.hostPath}:${m.containerPath}${m.readOnly ? ":ro" : ""}`);
  }
  if (spec.remove) args.push("--rm");
  args.push(spec.image, ...spec.args);
  return args;
}

export class DockerEngine implements ContainerEngine {
  constructor(readonly bin: string = "docker") {}

  async checkImage(image: string): Promise<boolean> {
    const res = await runLocalProcess({ argv: [this.bin, ...imagesQueryArgs(image)] });
    if (res.exitCode !== 0) return false;
    return parseImageId(res.stdout) !== null;
  }

  async buildImage(spec: BuildImageSpec): Promise<ExecutionResult> {
    return runLocalProcess({ argv: [this.bin, ...buildArgs(spec)] });
  }

  async pushImage(image: string): Promise<ExecutionResult & { step: "login" | "push" }> {
    const login = await runLocalProcess({ argv: [this.bin, "login"] });
    if (login.exitCode !== 0) return { ...login, step: "login" };
    const push = await runLocalProcess({ argv: [this.bin, "push", image] });
    return { ...push, step: "push" };
  }

  async runContainer(spec: RunContainerSpec): Promise<ExecutionResult> {
    if (!spec.image) throw new Error("docker image must be non-empty");
    return runLocalProcess({ argv: [this.bin, ...runArgs(spec)] });
  }

  renderRunCommand(spec: RunContainerSpec): string {
    return [this.bin, ...runArgs(spec)].join(" ");
  }
}
