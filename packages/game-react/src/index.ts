export * from "./keyboard";
export * from "./describe";
export * from "./createBoxingMatch";
export * from "./gameLoop";
export * from "./useBoxingGame";
