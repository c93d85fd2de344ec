import { promises as fs } from "fs";
import path from "path";
import { DescriptorWriteError } from "../../core/errors.js";

export const DOCKERFILE_NAME = "Dockerfile";

export interface DockerfileInput {
  framework: string;
  customCommands: string;
  script: string;
}

export function dockerfilePath(frameworkDir: string): string {
  return path.join(frameworkDir, DOCKERFILE_NAME);
}

/**
 * The image embeds the benchmark app and always starts it in local mode with setup skipped; the
 * framework under test gets its own virtualenv so its packages cannot clash with the app's.
 */
export function renderDockerfile(input: DockerfileInput): string {
  const lines: string[] = [];
  lines.push("FROM ubuntu:18.04");
  lines.push("");
  lines.push("RUN apt-get update");
  lines.push("RUN apt-get install -y curl wget unzip git");
  lines.push("RUN apt-get install -y python3 python3-pip python3-venv");
  lines.push("RUN pip3 install --upgrade pip");
  lines.push("");
  lines.push("ENV PIP /venvs/bench/bin/pip3");
  lines.push("ENV PY /venvs/bench/bin/python3 -W ignore");
  lines.push("ENV SPIP pip3");
  lines.push("ENV SPY python3");
  lines.push("");
  lines.push("RUN $SPY -m venv /venvs/bench");
  lines.push("RUN $PIP install --upgrade pip");
  lines.push("");
  lines.push("WORKDIR /bench");
  lines.push("VOLUME /input");
  lines.push("VOLUME /output");
  lines.push("");
  lines.push("ADD . /bench/");
  lines.push("");
  lines.push("RUN $PIP install --no-cache-dir -r requirements.txt");
  lines.push("RUN $PIP install --no-cache-dir openml");
  lines.push("");
  lines.push(input.customCommands);
  lines.push("");
  lines.push(`ENTRYPOINT ["/bin/bash", "-c", "$PY ${input.script} $0 $*"]`);
  lines.push(`CMD ["${input.framework}", "test"]`);
  lines.push("");
  return lines.join("\n");
}

export async function generateDockerfile(frameworkDir: string, input: DockerfileInput): Promise<string> {
  const target = dockerfilePath(frameworkDir);
  try {
    await fs.writeFile(target, renderDockerfile(input), "utf8");
  } catch (e) {
    throw new DescriptorWriteError(target, e);
  }
  return target;
}
