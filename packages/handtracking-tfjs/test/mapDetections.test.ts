import { describe, expect, it } from "vitest";
import { mapDetectionsToTrackedHands, StubHandModel } from "../src";

describe("mapDetectionsToTrackedHands", () => {
  it("normalizes keypoints to [0,1]", () => {
    const detections = [
      {
        handedness: "Left",
        score: 0.9,
        keypoints: [
          { x: 100, y: 50, z: 0 },
          { x: 200, y: 100, z: 1 },
        ],
      },
    ];
    const mapped = mapDetectionsToTrackedHands(detections, { videoWidth: 200, videoHeight: 100 });
    expect(mapped[0].handedness).toBe("Left");
    expect(mapped[0].score).toBe(0.9);
    expect(mapped[0].landmarks[0].x).toBeCloseTo(0.5);
    expect(mapped[0].landmarks[0].y).toBeCloseTo(0.5);
    expect(mapped[0].landmarks[1].x).toBeCloseTo(1);
  });

  it("accepts a handedness label object and falls back to 3D keypoints", () => {
    const mapped = mapDetectionsToTrackedHands(
      [{ handedness: { label: "Right" }, keypoints3D: [{ x: 0.25, y: 0.75 }] }],
      { videoWidth: 640, videoHeight: 480 }
    );
    expect(mapped).toEqual([{ handedness: "Right", landmarks: [{ x: 0.25, y: 0.75, z: undefined }], score: undefined }]);
  });

  it("defaults missing handedness to Right", () => {
    const mapped = mapDetectionsToTrackedHands([{ keypoints: [{ x: 0.1, y: 0.2 }] }], { videoWidth: 1, videoHeight: 1 });
    expect(mapped[0].handedness).toBe("Right");
  });

  it("drops garbled detections", () => {
    const mapped = mapDetectionsToTrackedHands(
      [
        null,
        "hand",
        { handedness: "Up", keypoints: [{ x: 0.1, y: 0.1 }] },
        { handedness: "Left", keypoints: [{ x: Number.NaN, y: 0.1 }] },
        { handedness: "Left", score: 3, keypoints: [{ x: 0.1, y: 0.1 }] },
        { handedness: "Left", keypoints: [] },
        { handedness: "Left", keypoints: [{ x: 0.4, y: 0.4 }] },
      ],
      { videoWidth: 640, videoHeight: 480 }
    );
    expect(mapped).toHaveLength(1);
    expect(mapped[0].landmarks[0]).toEqual({ x: 0.4, y: 0.4, z: undefined });
  });
});

describe("StubHandModel", () => {
  it("returns empty array", async () => {
    const stub = new StubHandModel();
    const hands = await stub.estimateHands({} as HTMLVideoElement);
    expect(hands).toEqual([]);
  });
});
