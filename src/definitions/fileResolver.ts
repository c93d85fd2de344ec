import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import * as z from "zod/v4";
import type { BenchmarkDefinition, FrameworkDefinition } from "../core/definitions.js";
import { UnknownDefinitionError } from "../core/errors.js";
import type { DefinitionResolver } from "./resolver.js";

const zFrameworksFile = z.record(
  z.string().min(1),
  z.object({
    version: z.string().nullish(),
    docker_image: z.object({
      author: z.string().min(1),
      image: z.string().min(1).nullish(),
      tag: z.string().min(1)
    }),
    docker_commands: z.string().nullish()
  })
);

const zBenchmarkFile = z.array(
  z.object({
    name: z.string().min(1),
    folds: z.number().int().min(1).default(10)
  })
);

const BENCHMARK_NAME = /^[A-Za-z0-9_.-]+$/;

async function readYaml(filePath: string): Promise<unknown | null> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") return null;
    throw e;
  }
  const parsed: unknown = YAML.parse(raw);
  return parsed;
}

/**
 * Reads `frameworks.yaml` and `benchmarks/<name>.yaml` under a resources directory. Framework names
 * match case-insensitively.
 */
export class FileDefinitionResolver implements DefinitionResolver {
  constructor(private readonly resourcesDir: string) {}

  async framework(name: string): Promise<FrameworkDefinition> {
    const filePath = path.join(this.resourcesDir, "frameworks.yaml");
    const raw = await readYaml(filePath);
    if (raw === null) throw new Error(`missing frameworks definition file ${filePath}`);
    const parsed = zFrameworksFile.safeParse(raw);
    if (!parsed.success) throw new Error(`invalid frameworks file ${filePath}: ${z.prettifyError(parsed.error)}`);

    const entry = Object.entries(parsed.data).find(([key]) => key.toLowerCase() === name.toLowerCase());
    if (!entry) throw new UnknownDefinitionError("framework", name);
    const [frameworkName, def] = entry;
    return {
      name: frameworkName,
      version: def.version ?? null,
      dockerImage: { author: def.docker_image.author, image: def.docker_image.image ?? null, tag: def.docker_image.tag },
      dockerCommands: def.docker_commands ?? null
    };
  }

  async benchmark(name: string): Promise<BenchmarkDefinition> {
    if (!BENCHMARK_NAME.test(name)) throw new UnknownDefinitionError("benchmark", name);
    const filePath = path.join(this.resourcesDir, "benchmarks", `${name}.yaml`);
    const raw = await readYaml(filePath);
    if (raw === null) throw new UnknownDefinitionError("benchmark", name);
    const parsed = zBenchmarkFile.safeParse(raw);
    if (!parsed.success) throw new Error(`invalid benchmark file ${filePath}: ${z.prettifyError(parsed.error)}`);
    return { name, tasks: parsed.data.map((t) => ({ name: t.name, folds: t.folds })) };
  }
}
