import type { DomainEvent } from "../engine/events";

// Sound effect slots in the order the audio backend indexes them
export const SOUND_CUES = [
  "rotate",
  "move",
  "softDrop",
  "lock",
  "pause",
  "lineClear",
] as const;

export type SoundCue = (typeof SOUND_CUES)[number];

export function cueIndex(cue: SoundCue): number {
  return SOUND_CUES.indexOf(cue);
}

/**
 * Playback side of the game. Implementations own the devices; the engine only
 * ever talks to this interface.
 */
export type AudioCollaborator = {
  playCue(cue: SoundCue): void;
  /** Flip music between playing and paused. */
  togglePause(): void;
  /** Speed the music up while the stack is high. */
  setPanic(on: boolean): void;
  /** Start the given track, wrapping over the available list. */
  playSong(index: number): void;
  toggleMute(): void;
  /** Stop music and drop panic speed. */
  reset(): void;
};

/**
 * Sound cues for one tick's events, in event order.
 */
export function cuesFor(events: ReadonlyArray<DomainEvent>): Array<SoundCue> {
  const cues: Array<SoundCue> = [];
  for (const e of events) {
    switch (e.kind) {
      case "PieceMoved":
        cues.push(e.dir === "Down" ? "softDrop" : "move");
        break;
      case "PieceRotated":
        cues.push("rotate");
        break;
      case "PieceLocked":
        cues.push("lock");
        break;
      case "LinesCleared":
        cues.push("lineClear");
        break;
      case "PauseToggled":
        // Only pausing plays the cue
        if (e.paused) cues.push("pause");
        break;
      default:
        break;
    }
  }
  return cues;
}

/**
 * Forward a tick's events to the audio collaborator.
 */
export function routeAudio(
  events: ReadonlyArray<DomainEvent>,
  audio: AudioCollaborator,
): void {
  for (const cue of cuesFor(events)) audio.playCue(cue);
  for (const e of events) {
    if (e.kind === "PauseToggled") audio.togglePause();
    if (e.kind === "PanicToggled") audio.setPanic(e.panic);
    if (e.kind === "GameOver") audio.setPanic(false);
  }
}
