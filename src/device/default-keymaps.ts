import type { GameKey } from "../control/types";

// Physical key code → game key(s)
export type Keymap = Readonly<Map<string, ReadonlyArray<GameKey>>>;

// Browser-style KeyboardEvent.code names
export const DEFAULT_KBD_MAP: Keymap = new Map([
  ["ArrowUp", ["up"]],
  ["ArrowDown", ["down"]],
  ["ArrowLeft", ["left"]],
  ["ArrowRight", ["right"]],
  ["KeyX", ["rotateCw"]],
  ["KeyZ", ["rotateCcw"]],
  ["KeyC", ["hold"]],
  ["Enter", ["pause"]],
  ["KeyM", ["mute"]],
  ["KeyN", ["nextSong"]],
]);
