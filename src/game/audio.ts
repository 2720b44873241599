/**
 * Sound cues
 *
 * The session only names cues; how (or whether) they sound is up to the
 * sink. The terminal build rings the bell for the cues that matter.
 */

export const CUES = ['move', 'rotate', 'drop', 'clear', 'game_over'] as const;
export type Cue = (typeof CUES)[number];

export interface CueSink {
  play(cue: Cue): void;
}

export const silentCues: CueSink = {
  play: () => {},
};

export interface BellCues extends CueSink {
  muted: boolean;
}

const BELL = '\x07';

/**
 * Ring the terminal bell for the given cues.
 * Movement cues are off by default.
 */
export function createBellCues(
  write: (data: string) => void,
  cues: readonly Cue[] = ['clear', 'game_over'],
  muted = false,
): BellCues {
  const ringing = new Set<Cue>(cues);
  const sink: BellCues = {
    muted,
    play(cue: Cue) {
      if (sink.muted || !ringing.has(cue)) return;
      write(BELL);
    },
  };
  return sink;
}
