import type { MatchCommand } from "@ringside-kit/combat-core";

export type KeyBinding =
  | { type: "COMMAND"; command: MatchCommand }
  | { type: "BLOCK" }
  | { type: "FULLSCREEN" };

/** Maps a `KeyboardEvent.code` to what it does in the ring. */
export function bindingForKey(code: string): KeyBinding | null {
  switch (code) {
    case "Space":
      return { type: "COMMAND", command: { type: "START" } };
    case "KeyR":
      return { type: "COMMAND", command: { type: "RESTART" } };
    case "Escape":
      return { type: "COMMAND", command: { type: "QUIT" } };
    case "KeyB":
      return { type: "BLOCK" };
    case "KeyF":
      return { type: "FULLSCREEN" };
    default:
      return null;
  }
}
