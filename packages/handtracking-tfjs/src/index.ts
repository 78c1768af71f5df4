import type { HandDetector } from "@tensorflow-models/hand-pose-detection";
import type { TrackedHand } from "@ringside-kit/gesture-core";
import { mapDetectionsToTrackedHands } from "./mapDetections";

export { mapDetectionsToTrackedHands } from "./mapDetections";
export { LatestFrameSlot } from "./LatestFrameSlot";

export interface HandModel {
  estimateHands(video: HTMLVideoElement): Promise<TrackedHand[]>;
}

export interface TFJSHandModelOptions {
  modelType?: "lite" | "full";
  maxHands?: number;
  solutionPath?: string;
  flipHorizontal?: boolean;
  runtime?: "mediapipe" | "tfjs";
}

type Runtime = "mediapipe" | "tfjs";
const detectorPromises: Record<Runtime, Promise<HandDetector> | null> = {
  mediapipe: null,
  tfjs: null,
};
let tfBackendReady: Promise<void> | null = null;

function loadDetector(runtime: Runtime, options: TFJSHandModelOptions): Promise<HandDetector> {
  const existing = detectorPromises[runtime];
  if (existing) return existing;
  const created = (async () => {
    if (runtime === "tfjs") {
      await ensureTfjsBackend();
    }
    const handPoseDetection = await import("@tensorflow-models/hand-pose-detection");
    const { SupportedModels, createDetector } = handPoseDetection;
    const modelType = options.modelType ?? "lite";
    const maxHands = options.maxHands ?? 2;
    if (runtime === "tfjs") {
      return createDetector(SupportedModels.MediaPipeHands, { runtime, modelType, maxHands });
    }
    return createDetector(SupportedModels.MediaPipeHands, {
      runtime,
      modelType,
      maxHands,
      solutionPath: options.solutionPath ?? "https://cdn.jsdelivr.net/npm/@mediapipe/hands@0.4.1675469240",
    });
  })();
  detectorPromises[runtime] = created;
  return created;
}

class TFJSHandModel implements HandModel {
  private currentRuntime: Runtime;
  private readonly allowFallback: boolean;

  constructor(private readonly options: TFJSHandModelOptions = {}) {
    this.currentRuntime = options.runtime ?? "mediapipe";
    this.allowFallback = !options.runtime;
  }

  async estimateHands(video: HTMLVideoElement): Promise<TrackedHand[]> {
    if (!video.videoWidth || !video.videoHeight) {
      return [];
    }
    try {
      const detector = await loadDetector(this.currentRuntime, {
        modelType: this.options.modelType ?? (this.currentRuntime === "tfjs" ? "full" : "lite"),
        maxHands: this.options.maxHands,
        solutionPath: this.options.solutionPath,
      });
      const predictions = await detector.estimateHands(video, { flipHorizontal: !!this.options.flipHorizontal });
      return mapDetectionsToTrackedHands(predictions, video);
    } catch (err) {
      // AbortError happens when play() is interrupted; skip frame.
      if (errorName(err) !== "AbortError") {
        console.error("handtracking-tfjs estimateHands failed", err);
        // Reset this runtime so next frame re-creates it; optionally fall back.
        detectorPromises[this.currentRuntime] = null;
        if (this.allowFallback && this.currentRuntime === "mediapipe") {
          this.currentRuntime = "tfjs";
        }
      }
      return [];
    }
  }
}

function errorName(err: unknown): string | undefined {
  return err instanceof Error ? err.name : undefined;
}

function ensureTfjsBackend(): Promise<void> {
  if (tfBackendReady) return tfBackendReady;
  tfBackendReady = (async () => {
    const tf = await import("@tensorflow/tfjs-core");
    await import("@tensorflow/tfjs-backend-webgl");
    try {
      if (tf.getBackend() !== "webgl") {
        await tf.setBackend("webgl");
      }
      await tf.ready();
    } catch (err) {
      console.error("handtracking-tfjs WebGL backend unavailable, using CPU", err);
      await import("@tensorflow/tfjs-backend-cpu");
      await tf.setBackend("cpu");
      await tf.ready();
    }
  })();
  return tfBackendReady;
}

export async function createTFJSHandModel(options?: TFJSHandModelOptions): Promise<HandModel> {
  return new TFJSHandModel(options);
}

// For environments without TFJS support.
export class StubHandModel implements HandModel {
  async estimateHands(_video: HTMLVideoElement): Promise<TrackedHand[]> {
    return [];
  }
}
