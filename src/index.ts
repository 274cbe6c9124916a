export { newGame, startGame, step, stepN } from "./engine/index";
export * from "./engine/selectors";
export {
  DEFAULT_ENGINE_CONFIG,
  DEFAULT_SESSION_META,
  mkInitialState,
  createUniformRng,
  type Difficulty,
  type EngineConfig,
  type GameMode,
  type GameState,
  type PieceKind,
  type PieceRandomGenerator,
  type SessionMeta,
  type SquareEffect,
} from "./engine/types";
export { SequenceRng } from "./engine/core/rng/sequence";
export { PIECES } from "./engine/core/pieces";
export type { Command } from "./engine/commands";
export type { DomainEvent } from "./engine/events";
export { controlStep, emptyInput, makeInput } from "./control/index";
export type { GameKey, InputSnapshot, KeyState } from "./control/types";
export { computeEdges, makeInitialEdgeState } from "./device/edge-computation";
export { DEFAULT_KBD_MAP, type Keymap } from "./device/default-keymaps";
export { runtimeStep } from "./runtime/loop";
export {
  cuesFor,
  routeAudio,
  type AudioCollaborator,
  type SoundCue,
} from "./app/audio";
export {
  DEFAULT_PLAYER_CONFIG,
  loadConfig,
  recordResult,
  saveConfig,
  type PlayerConfig,
} from "./app/config";
export { GameSession, type SessionPhase } from "./app/session";
