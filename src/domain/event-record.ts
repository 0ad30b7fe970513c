/**
 * Core domain types for the live scoreboard feed.
 *
 * These types describe records as they leave the transport and enter the
 * buffer. They carry no framework dependencies.
 */

/** Top-level key of a scoreboard subscription payload. */
export const SCOREBOARD_KEY = 'scoreboard';

/** Free-form record delivered by the feed (gameId, teams, scores, status...). */
export type RawRecord = Record<string, unknown>;

/**
 * A delivered record stamped with its local receipt time.
 *
 * `received_at` is Unix epoch seconds at ingestion, not at origin.
 */
export type EventRecord = RawRecord & {
  readonly received_at: number;
};
