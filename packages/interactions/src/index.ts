/**
 * @scanprobe/interactions
 *
 * Step-level interaction with the app under test: fallback chains, scan
 * polling and result text-mining.
 */

export * from './profile.js';
export * from './strategies.js';
export * from './polling.js';
export * from './extraction.js';
export {
  InteractionSequencer,
  DEFAULT_TIMINGS,
  type SequencerOptions,
  type SequencerTimings,
} from './sequencer.js';
