export * from "./types";
export * from "./HpPool";
export * from "./OpponentAI";
export * from "./CombatResolver";
export * from "./MatchController";
