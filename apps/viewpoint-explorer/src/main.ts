#!/usr/bin/env tsx
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { defaultViewpointConfig } from "@viewsynth/geometry-core";
import { NormalSketchRenderer, PlyMeshKeypointStore } from "@viewsynth/mesh-three";
import { ViewpointSession, consoleLogger, runSession } from "@viewsynth/session-core";
import { TfjsSynthesisModel } from "@viewsynth/synthesis-tfjs";
import { checkPaths, parseCliArgs } from "./config";
import { loadTextureDataset } from "./dataset";
import { keypresses } from "./keyboard";
import { PngFrameSink } from "./PngFrameSink";
import { loadVisibilityPredicate } from "./visibility";

const helpText = readFileSync(fileURLToPath(new URL("./help.txt", import.meta.url)), "utf8");

async function main(argv: string[]): Promise<void> {
  const config = parseCliArgs(argv);
  if (!config) {
    process.stdout.write(helpText);
    return;
  }
  await checkPaths(config);

  const logger = consoleLogger;
  const frame = defaultViewpointConfig.frame;
  const [dataset, model, predicate] = await Promise.all([
    loadTextureDataset(config.datasetDir, {
      objectClass: config.objectClass,
      frame,
      fastLoad: config.demo,
      logger,
    }),
    TfjsSynthesisModel.load(config.modelDir, { layout: config.layout, logger }),
    loadVisibilityPredicate(config.cadRoot, config.objectClass, logger),
  ]);

  const session = new ViewpointSession(
    config.objectClass,
    {
      store: new PlyMeshKeypointStore(config.cadRoot),
      renderer: new NormalSketchRenderer(),
      dataset,
      predicate,
      model,
      sink: new PngFrameSink({ dumpDir: config.dumpDir, previewPath: config.preview, logger }),
    },
    { colorSpace: "lab", verbose: config.verbose, viewpoint: { frame }, logger }
  );

  process.stdout.write(helpText);
  await session.initialize();
  const summary = await runSession(keypresses(process.stdin), session, { logger });
  logger.info(`Session ended after ${summary.ticks} events`);
  model.dispose();
}

main(process.argv.slice(2)).catch((err: unknown) => {
  consoleLogger.error(err instanceof Error ? `${err.name}: ${err.message}` : String(err));
  process.exitCode = 1;
});
