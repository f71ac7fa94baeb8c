/**
 * Stakeline Account Module
 */

export { SequenceManager } from './sequence.js';
export type { AccountSource, SequenceState, SequenceReservation } from './sequence.js';
