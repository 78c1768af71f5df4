export * from "./types";
export * from "./RingBuffer";
export * from "./GestureClassifier";
