import { useCallback, useEffect, useRef, useState } from "react";
import type { KeyboardInput, MatchCommand, MatchControllerOptions, MatchSnapshot } from "@ringside-kit/combat-core";
import type { GestureClassifierOptions, GestureDebugState, HandFrame, TrackedHand } from "@ringside-kit/gesture-core";
import { LatestFrameSlot } from "@ringside-kit/handtracking-tfjs";
import type { HandModel } from "@ringside-kit/handtracking-tfjs";
import { createBoxingMatch } from "./createBoxingMatch";
import { nextGameInput, tickDelta } from "./gameLoop";
import { bindingForKey } from "./keyboard";

export type GameError =
  | { type: "webcam-permission-denied" }
  | { type: "no-webcam" }
  | { type: "model-init-failed"; error: unknown };

export type UseBoxingGameOptions = {
  model: HandModel | null;
  /** Caps how often the hand model runs; the game loop always runs per animation frame. */
  fps?: number;
  debug?: boolean;
  gestureOptions?: GestureClassifierOptions;
  matchOptions?: MatchControllerOptions;
  onError?: (err: GameError) => void;
  onFullscreenToggle?: () => void;
  onQuit?: () => void;
};

export function useBoxingGame(options: UseBoxingGameOptions) {
  const { model, fps, debug, gestureOptions, matchOptions } = options;
  const videoRef = useRef<HTMLVideoElement>(null);
  const overlayRef = useRef<HTMLCanvasElement>(null);
  const slotRef = useRef(new LatestFrameSlot<HandFrame>());
  const handsRef = useRef<TrackedHand[]>([]);
  const keyboardRef = useRef<KeyboardInput>({ block: false });

  const [initialMatch] = useState(() => createBoxingMatch(gestureOptions, matchOptions));
  const matchRef = useRef(initialMatch);
  const matchOptionsRef = useRef({ gestureOptions, matchOptions });
  useEffect(() => {
    const previous = matchOptionsRef.current;
    if (previous.gestureOptions === gestureOptions && previous.matchOptions === matchOptions) return;
    matchOptionsRef.current = { gestureOptions, matchOptions };
    matchRef.current = createBoxingMatch(gestureOptions, matchOptions);
  }, [gestureOptions, matchOptions]);

  const modelRef = useRef(model);
  useEffect(() => {
    modelRef.current = model;
  }, [model]);

  const [snapshot, setSnapshot] = useState<MatchSnapshot>(() => initialMatch.controller.getSnapshot());
  const [droppedFrames, setDroppedFrames] = useState(0);

  const onErrorRef = useRef(options.onError);
  useEffect(() => {
    onErrorRef.current = options.onError;
  }, [options.onError]);

  const onFullscreenRef = useRef(options.onFullscreenToggle);
  useEffect(() => {
    onFullscreenRef.current = options.onFullscreenToggle;
  }, [options.onFullscreenToggle]);

  const onQuitRef = useRef(options.onQuit);
  useEffect(() => {
    onQuitRef.current = options.onQuit;
  }, [options.onQuit]);

  const dispatch = useCallback((command: MatchCommand) => {
    matchRef.current.controller.handle(command);
  }, []);

  // Game loop: one tick per animation frame, never waits on the camera.
  useEffect(() => {
    let cancelled = false;
    let raf: number | null = null;
    let lastTs: number | null = null;
    let quitNotified = false;

    const loop = (now: number) => {
      if (cancelled) return;
      const dt = tickDelta(now, lastTs);
      lastTs = now;

      const { controller, classifier } = matchRef.current;
      const input = nextGameInput(slotRef.current.take(), modelRef.current !== null, now);
      const next = controller.tick(dt, input, keyboardRef.current);
      setSnapshot(next);
      setDroppedFrames(slotRef.current.droppedCount);

      if (next.quitRequested && !quitNotified) {
        quitNotified = true;
        onQuitRef.current?.();
      } else if (!next.quitRequested) {
        quitNotified = false;
      }

      drawOverlay({
        canvas: overlayRef.current,
        hands: handsRef.current,
        blocking: next.action === "BLOCK",
        debugState: debug ? classifier.getDebugState() : undefined,
      });

      raf = requestAnimationFrame(loop);
    };

    raf = requestAnimationFrame(loop);
    return () => {
      cancelled = true;
      if (raf !== null) cancelAnimationFrame(raf);
    };
  }, [debug]);

  useEffect(() => {
    const onKeyDown = (ev: KeyboardEvent) => {
      const binding = bindingForKey(ev.code);
      if (!binding) return;
      if (binding.type === "BLOCK") {
        keyboardRef.current = { block: true };
        return;
      }
      if (ev.repeat) return;
      if (binding.type === "FULLSCREEN") {
        onFullscreenRef.current?.();
        return;
      }
      ev.preventDefault();
      matchRef.current.controller.handle(binding.command);
    };

    const onKeyUp = (ev: KeyboardEvent) => {
      if (bindingForKey(ev.code)?.type === "BLOCK") {
        keyboardRef.current = { block: false };
      }
    };

    window.addEventListener("keydown", onKeyDown);
    window.addEventListener("keyup", onKeyUp);
    return () => {
      window.removeEventListener("keydown", onKeyDown);
      window.removeEventListener("keyup", onKeyUp);
    };
  }, []);

  // Capture loop: runs the hand model as fast as it allows and drops results into the slot.
  const lastCaptureTs = useRef<number>(0);
  const captureRafRef = useRef<number | null>(null);
  const streamRef = useRef<MediaStream | null>(null);

  useEffect(() => {
    let cancelled = false;
    const slot = slotRef.current;

    async function startWebcam() {
      if (typeof navigator === "undefined" || !navigator.mediaDevices?.getUserMedia) {
        handleError({ type: "no-webcam" });
        return;
      }
      try {
        const stream = await navigator.mediaDevices.getUserMedia({ video: true });
        streamRef.current = stream;
        if (videoRef.current) {
          videoRef.current.srcObject = stream;
          try {
            await videoRef.current.play();
          } catch (err: unknown) {
            if (errorName(err) !== "AbortError") {
              throw err;
            }
          }
        }
        startCapture();
      } catch (err: unknown) {
        const name = errorName(err);
        if (name === "NotAllowedError" || name === "SecurityError") {
          handleError({ type: "webcam-permission-denied" });
          return;
        }
        handleError({ type: "model-init-failed", error: err });
      }
    }

    function stopWebcam() {
      if (captureRafRef.current !== null) cancelAnimationFrame(captureRafRef.current);
      captureRafRef.current = null;
      if (streamRef.current) {
        streamRef.current.getTracks().forEach((t) => t.stop());
        streamRef.current = null;
      }
      handsRef.current = [];
      slot.clear();
    }

    const startCapture = () => {
      const capture = async () => {
        if (cancelled) return;
        const videoEl = videoRef.current;
        const scheduleNext = () => {
          if (cancelled) return;
          captureRafRef.current = requestAnimationFrame(capture);
        };

        if (!model || !videoEl) {
          scheduleNext();
          return;
        }

        const now = performance.now();
        const sinceLast = lastCaptureTs.current ? now - lastCaptureTs.current : undefined;
        if (fps && sinceLast && sinceLast < 1000 / fps) {
          scheduleNext();
          return;
        }
        lastCaptureTs.current = now;

        try {
          const hands = await model.estimateHands(videoEl);
          if (!cancelled) {
            handsRef.current = hands;
            slot.put({ hands, timestamp: now });
          }
        } catch (err) {
          handleError({ type: "model-init-failed", error: err });
        }

        scheduleNext();
      };

      captureRafRef.current = requestAnimationFrame(capture);
    };

    if (model) {
      void startWebcam();
    } else {
      stopWebcam();
    }

    return () => {
      cancelled = true;
      stopWebcam();
    };
  }, [model, fps]);

  return { videoRef, overlayRef, snapshot, droppedFrames, dispatch } as const;

  function handleError(err: GameError) {
    onErrorRef.current?.(err);
    // Keep console fallback for visibility during development
    console.error(err);
  }
}

function errorName(err: unknown): string | undefined {
  return err instanceof Error ? err.name : undefined;
}

function drawOverlay({
  canvas,
  hands,
  blocking,
  debugState,
}: {
  canvas: HTMLCanvasElement | null;
  hands: TrackedHand[];
  blocking: boolean;
  debugState?: GestureDebugState;
}) {
  if (!canvas) return;
  const ctx = canvas.getContext("2d");
  if (!ctx) return;

  if (canvas.width !== canvas.clientWidth || canvas.height !== canvas.clientHeight) {
    canvas.width = canvas.clientWidth;
    canvas.height = canvas.clientHeight;
  }

  ctx.clearRect(0, 0, canvas.width, canvas.height);
  ctx.fillStyle = blocking ? "#3d7bff" : "#46e6a5";
  hands.forEach((hand) => {
    hand.landmarks.forEach((lm) => {
      ctx.beginPath();
      ctx.arc(lm.x * canvas.width, lm.y * canvas.height, 4, 0, Math.PI * 2);
      ctx.fill();
    });
  });

  // Dodge zones
  ctx.strokeStyle = "rgba(255, 255, 255, 0.25)";
  ctx.lineWidth = 1;
  [1 / 3, 2 / 3].forEach((fraction) => {
    ctx.beginPath();
    ctx.moveTo(canvas.width * fraction, 0);
    ctx.lineTo(canvas.width * fraction, canvas.height);
    ctx.stroke();
  });

  if (debugState) {
    ctx.fillStyle = "#ffffff";
    ctx.font = "12px sans-serif";
    ctx.fillText(`action: ${debugState.action} hands: ${debugState.handCount}`, 10, 20);
    if (debugState.dodgeSide) {
      ctx.fillText(`lean ${debugState.dodgeSide} x${debugState.dodgeStreak}`, 10, 36);
    }
  }
}
