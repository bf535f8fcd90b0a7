import {
  ConfigurationError,
  projectKeypoints,
  toCameraPose,
  ViewpointController,
} from "@viewsynth/geometry-core";
import type {
  FrameSize,
  Viewpoint,
  ViewpointConfig,
  ViewpointControls,
} from "@viewsynth/geometry-core";
import type { ColorSpace, RgbImage } from "@viewsynth/image-core";
import { getClassDefinition, resolvePlanes, warpUnwarpPlanes } from "@viewsynth/plane-core";
import type { ObjectClass, VisibilityPredicate } from "@viewsynth/plane-core";
import { assembleSynthesisInput, decodeSynthesis } from "./assembler";
import { CAD_CATALOG_SIZE } from "./collaborators";
import type {
  CadModel,
  FrameSink,
  MeshKeypointStore,
  Renderer,
  SynthesisModel,
  TextureDataset,
  TextureExample,
} from "./collaborators";
import { composeFrame } from "./compositor";
import { CollaboratorFailureError } from "./errors";
import type { SessionEvent } from "./events";
import type { Logger } from "./logger";
import { consoleLogger } from "./logger";
import { dumpName } from "./naming";
import { transition } from "./transitions";
import type { StepConfig } from "./transitions";

export type SessionPhase = "idle" | "awaiting-render";

export interface SessionState {
  phase: SessionPhase;
  controls: ViewpointControls;
  focal: number;
  cadIndex: number;
  /** Dataset index NEXT_EXAMPLE selects next. */
  exampleIndex: number;
  dumpId: number;
  model: CadModel | null;
  texture: TextureExample | null;
  lastFrame: RgbImage | null;
  /** Viewpoint `lastFrame` was rendered from; dumps are named after it. */
  lastViewpoint: Viewpoint | null;
}

export interface SessionCollaborators {
  store: MeshKeypointStore;
  renderer: Renderer;
  dataset: TextureDataset;
  predicate: VisibilityPredicate;
  model: SynthesisModel;
  sink: FrameSink;
}

export interface ViewpointSessionOptions {
  yawStepDeg?: number;
  pitchStepDeg?: number;
  radiusStep?: number;
  catalogSize?: number;
  colorSpace?: ColorSpace;
  /** Overrides the predicate's own visibility bin width. */
  binDeg?: number;
  verbose?: boolean;
  viewpoint?: ViewpointConfig;
  logger?: Logger;
}

type ResolvedOptions = Required<Omit<ViewpointSessionOptions, "binDeg">> & { binDeg?: number };

const DEFAULTS: ResolvedOptions = {
  yawStepDeg: 5,
  pitchStepDeg: 5,
  radiusStep: 0.05,
  catalogSize: CAD_CATALOG_SIZE,
  colorSpace: "lab",
  verbose: false,
  viewpoint: {},
  logger: consoleLogger,
};

export interface TickResult {
  event: SessionEvent;
  /** Frame on display after the tick. */
  frame: RgbImage | null;
  dumpedTo?: string;
}

/**
 * Owns the session state and runs one full pipeline pass per event:
 * viewpoint → keypoints → plane layout → warp → synthesis → composite.
 */
export class ViewpointSession {
  private readonly options: ResolvedOptions;
  private readonly viewpoints: ViewpointController;
  private readonly frame: FrameSize;
  private state: SessionState;

  constructor(
    private readonly objectClass: ObjectClass,
    private readonly collaborators: SessionCollaborators,
    opts?: ViewpointSessionOptions
  ) {
    this.options = { ...DEFAULTS, ...(opts ?? {}) };
    this.viewpoints = new ViewpointController(this.options.viewpoint);
    this.frame = this.viewpoints.getConfig().frame;
    this.state = {
      phase: "idle",
      controls: this.viewpoints.initialControls(),
      focal: this.viewpoints.getConfig().focal,
      cadIndex: 0,
      exampleIndex: 0,
      dumpId: 0,
      model: null,
      texture: null,
      lastFrame: null,
      lastViewpoint: null,
    };
  }

  /** Loads CAD model 0 and the first example, then renders once. */
  async initialize(): Promise<RgbImage> {
    if (this.collaborators.dataset.size === 0) {
      throw new ConfigurationError("Texture dataset is empty");
    }
    return this.runTick(async () => {
      await this.loadModel(0);
      this.selectNextExample();
      return this.render();
    });
  }

  async handle(event: SessionEvent): Promise<TickResult> {
    const effect = transition(this.state, event, this.steps());

    let dumpedTo: string | undefined;
    await this.runTick(async () => {
      switch (effect.type) {
        case "RENDER":
          if (effect.command) {
            this.state.controls = this.viewpoints.apply(this.state.controls, effect.command);
          }
          return this.render();
        case "LOAD_MODEL":
          await this.loadModel(effect.cadIndex);
          return this.render();
        case "SELECT_EXAMPLE":
          this.selectNextExample();
          return this.render();
        case "DUMP":
          dumpedTo = await this.dump();
          return this.state.lastFrame;
      }
    });

    return { event, frame: this.state.lastFrame, dumpedTo };
  }

  getState(): SessionState {
    return { ...this.state, controls: { ...this.state.controls } };
  }

  private async runTick<T>(body: () => Promise<T>): Promise<T> {
    if (this.state.phase === "awaiting-render") {
      throw new Error("A tick is already in progress");
    }
    this.state.phase = "awaiting-render";
    try {
      return await body();
    } finally {
      this.state.phase = "idle";
    }
  }

  private steps(): StepConfig {
    const { yawStepDeg, pitchStepDeg, radiusStep, catalogSize } = this.options;
    return { yawStepDeg, pitchStepDeg, radiusStep, catalogSize };
  }

  private async loadModel(cadIndex: number): Promise<void> {
    const model = await this.call("mesh store", () =>
      this.collaborators.store.load(this.objectClass, cadIndex)
    );
    this.state.cadIndex = cadIndex;
    this.state.model = model;
  }

  private selectNextExample(): void {
    const { dataset } = this.collaborators;
    this.state.texture = dataset.get(this.state.exampleIndex);
    this.state.exampleIndex = (this.state.exampleIndex + 1) % dataset.size;
  }

  private async render(): Promise<RgbImage> {
    const { model, texture, controls } = this.state;
    if (!model || !texture) {
      throw new Error("Session is not initialized");
    }
    const { logger, verbose, colorSpace } = this.options;

    const viewpoint = this.viewpoints.toViewpoint(controls);
    if (verbose) {
      logger.info(
        `Azimuth:${viewpoint.azimuthDeg} Elevation:${viewpoint.pitchDeg} Radius:${viewpoint.radius}`
      );
    }
    const pose = toCameraPose(viewpoint, this.frame);

    const sketch = await this.call("renderer", () =>
      this.collaborators.renderer.render(pose, model.mesh)
    );

    const projection = projectKeypoints(model.keypoints, pose);
    if (projection.behindCamera.length) {
      logger.warn(`Keypoints behind the camera, clamped: ${projection.behindCamera.join(", ")}`);
    }

    const planes = await this.call("visibility predicate", async () =>
      resolvePlanes({
        objectClass: this.objectClass,
        cadIndex: this.state.cadIndex,
        azimuthDeg: viewpoint.azimuthDeg,
        elevationDeg: viewpoint.elevationDeg,
        keypoints2d: projection.points,
        keypoints3d: model.keypoints,
        predicate: this.collaborators.predicate,
        binDeg: this.options.binDeg,
      })
    );

    const { warped, degenerate } = warpUnwarpPlanes(
      {
        srcPlanes: texture.planes,
        srcKeypoints: texture.planeKeypoints,
        dstKeypoints: planes.map((p) => p.keypoints),
        srcVisible: texture.planeVisibility,
        dstVisible: planes.map((p) => p.visible),
        frame: this.frame,
      },
      getClassDefinition(this.objectClass)
    );
    if (degenerate.length) {
      const names = degenerate.map((i) => planes[i].name).join(", ");
      logger.warn(`Degenerate plane correspondences, identity warp used: ${names}`);
    }

    const input = assembleSynthesisInput({
      objectClass: this.objectClass,
      sketch,
      central: texture.central,
      warpedPlanes: warped,
      colorSpace,
    });
    const output = await this.call("synthesis model", () =>
      this.collaborators.model.synthesize(input)
    );

    const frame = composeFrame({
      sketch,
      central: texture.central,
      synthesized: decodeSynthesis(output, colorSpace),
      source: texture.image,
    });
    await this.call("frame sink", () => this.collaborators.sink.show(frame));
    this.state.lastFrame = frame;
    this.state.lastViewpoint = viewpoint;
    return frame;
  }

  private async dump(): Promise<string | undefined> {
    const { lastFrame, lastViewpoint } = this.state;
    if (!lastFrame || !lastViewpoint) {
      this.options.logger.warn("Nothing to dump yet");
      return undefined;
    }
    const name = dumpName(this.state.dumpId, lastViewpoint);
    const path = await this.call("frame sink", () =>
      this.collaborators.sink.persist(lastFrame, name)
    );
    this.options.logger.info(`Saved ${path}.`);
    this.state.dumpId += 1;
    return path;
  }

  private async call<T>(collaborator: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof ConfigurationError) throw err;
      throw new CollaboratorFailureError(collaborator, err);
    }
  }
}
