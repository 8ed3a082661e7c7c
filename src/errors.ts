// ─── midi-beatmap: Errors ────────────────────────────────────────────────────

/** Base class for every failure raised by the conversion core. */
export class MidiBeatmapError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed event data: bad pairing, bad timestamps, unreadable meta events. */
export class InvalidMidiError extends MidiBeatmapError {}

/** A tempo that is non-positive, non-finite, or cannot be encoded. */
export class InvalidTempoError extends MidiBeatmapError {
  constructor(
    message: string,
    readonly bpm: number,
  ) {
    super(message);
  }
}

/** A negative time span reached the tempo integration math. */
export class NegativeDurationError extends MidiBeatmapError {}

/** A tempo query fell before the first tempo change. */
export class NoTempoDefinedError extends MidiBeatmapError {
  constructor(readonly beat: number) {
    super(`No tempo defined at beat ${beat}`);
  }
}
