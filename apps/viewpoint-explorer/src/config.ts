import type { Stats } from "node:fs";
import { stat } from "node:fs/promises";
import path from "node:path";
import { parseArgs } from "node:util";
import { z } from "zod";
import { ConfigurationError } from "@viewsynth/session-core";

export const explorerConfigSchema = z.object({
  objectClass: z.enum(["car", "chair"]),
  datasetDir: z.string().min(1),
  modelDir: z.string().min(1),
  cadRoot: z.string().min(1),
  dumpDir: z.string().min(1).default("/tmp"),
  layout: z.enum(["nchw", "nhwc"]).default("nchw"),
  demo: z.boolean().default(false),
  verbose: z.boolean().default(false),
  preview: z.string().min(1).optional(),
});

export type ExplorerConfig = z.infer<typeof explorerConfigSchema>;

/** Parsed configuration, or null when `--help` was asked for. */
export function parseCliArgs(argv: string[]): ExplorerConfig | null {
  let parsed: ReturnType<typeof parse>;
  try {
    parsed = parse(argv);
  } catch (err) {
    throw new ConfigurationError(err instanceof Error ? err.message : String(err), { cause: err });
  }
  const { values, positionals } = parsed;
  if (values.help) return null;

  if (positionals.length !== 4) {
    throw new ConfigurationError(
      `Expected <class> <texture_dataset_dir> <model_dir> <cad_root>, got ${positionals.length} arguments`
    );
  }
  const [objectClass, datasetDir, modelDir, cadRoot] = positionals;
  const result = explorerConfigSchema.safeParse({
    objectClass,
    datasetDir,
    modelDir,
    cadRoot,
    dumpDir: values["dump-dir"],
    layout: values.layout,
    demo: values.demo,
    verbose: values.verbose,
    preview: values.preview,
  });
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigurationError(`Invalid arguments: ${issues}`);
  }
  return result.data;
}

function parse(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      "dump-dir": { type: "string" },
      layout: { type: "string" },
      demo: { type: "boolean" },
      verbose: { type: "boolean", short: "v" },
      preview: { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });
}

export const DATASET_MANIFEST = "index.json";

/** Start-up checks on the input paths. */
export async function checkPaths(config: ExplorerConfig): Promise<void> {
  await expectKind(path.join(config.modelDir, "model.json"), "file", "Synthesis model");
  await expectKind(config.cadRoot, "directory", "CAD root");
  await expectKind(path.join(config.datasetDir, DATASET_MANIFEST), "file", "Dataset manifest");
}

async function expectKind(target: string, kind: "file" | "directory", label: string): Promise<void> {
  let stats: Stats;
  try {
    stats = await stat(target);
  } catch (err) {
    throw new ConfigurationError(`${label} not found: ${target}`, { cause: err });
  }
  const ok = kind === "file" ? stats.isFile() : stats.isDirectory();
  if (!ok) {
    throw new ConfigurationError(`${label} is not a ${kind}: ${target}`);
  }
}
