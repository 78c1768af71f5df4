import { z } from "zod";
import type { Handedness, Landmark, TrackedHand } from "@ringside-kit/gesture-core";

const HandednessSchema = z.enum(["Left", "Right"]);

const KeypointSchema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
  z: z.number().finite().optional(),
});

// Shape of a hand-pose-detection `Hand`, loose enough for older MediaPipe payloads.
export const DetectionSchema = z.object({
  handedness: z.union([HandednessSchema, z.object({ label: HandednessSchema })]).optional(),
  score: z.number().min(0).max(1).optional(),
  keypoints: z.array(KeypointSchema).optional(),
  keypoints3D: z.array(KeypointSchema).optional(),
});

export type Detection = z.infer<typeof DetectionSchema>;

export function mapDetectionsToTrackedHands(
  detections: readonly unknown[],
  video: { videoWidth: number; videoHeight: number }
): TrackedHand[] {
  const width = video.videoWidth || 1;
  const height = video.videoHeight || 1;

  const hands: TrackedHand[] = [];
  for (const raw of detections) {
    const parsed = DetectionSchema.safeParse(raw);
    if (!parsed.success) continue;
    const detection = parsed.data;
    const keypoints = detection.keypoints ?? detection.keypoints3D ?? [];
    if (!keypoints.length) continue;

    const landmarks = keypoints.map((kp): Landmark => {
      const isNormalized = kp.x >= 0 && kp.x <= 1 && kp.y >= 0 && kp.y <= 1;
      const x = isNormalized ? kp.x : kp.x / width;
      const y = isNormalized ? kp.y : kp.y / height;
      return { x: clamp01(x), y: clamp01(y), z: kp.z };
    });
    hands.push({ handedness: handednessOf(detection), landmarks, score: detection.score });
  }
  return hands;
}

function handednessOf(detection: Detection): Handedness {
  const { handedness } = detection;
  if (!handedness) return "Right";
  return typeof handedness === "string" ? handedness : handedness.label;
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}
