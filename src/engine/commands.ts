export type Command =
  | { kind: "MoveLeft"; source: "tap" | "repeat" }
  | { kind: "MoveRight"; source: "tap" | "repeat" }
  | { kind: "RotateCW" }
  | { kind: "RotateCCW" }
  | { kind: "SoftDropOn" }
  | { kind: "SoftDropOff" }
  | { kind: "HardDrop" }
  | { kind: "Hold" }
  | { kind: "TogglePause" };
