// ============================================
// Audio Trigger
// Fire-and-forget bridge to the host's audio playback
// ============================================

import type { SoundCue } from '#shared';
import { logger } from './logger';

/**
 * Host audio playback. May play synchronously or return a promise;
 * either way the simulation never waits on it.
 */
export interface AudioTrigger {
  play(cue: SoundCue): void | Promise<void>;
}

/**
 * Play a cue without letting playback failures reach game logic.
 * Synchronous throws and rejected promises are logged and dropped.
 */
export function triggerCue(audio: AudioTrigger, cue: SoundCue): void {
  try {
    const result = audio.play(cue);
    if (result instanceof Promise) {
      void result.catch((error: unknown) => logAudioFailure(cue, error));
    }
  } catch (error) {
    logAudioFailure(cue, error);
  }
}

function logAudioFailure(cue: SoundCue, error: unknown): void {
  logger.warn(
    {
      event: 'audio_failed',
      cue,
      error: error instanceof Error ? error.message : String(error),
    },
    `Failed to play ${cue}`
  );
}

/**
 * Audio trigger that plays nothing (headless runs)
 */
export const silentAudio: AudioTrigger = {
  play: () => {},
};
