/**
 * Shared types for the capture engine and its host protocol.
 *
 * @module protocol/types
 */

// ---------------------------------------------------------------------------
// Session state (diagnostic code exposed by the device)
// ---------------------------------------------------------------------------

/** Acquisition controller session states, valued by their diagnostic code. */
export enum SessionState {
  Idle = 0,
  Config = 1,
  Armed = 2,
  Sampling = 3,
  Ready = 4,
  Transmit = 5,
  SetParameter = 6,
  SetSampleRate = 7
}

/** Human-readable names for each session state. */
export const SESSION_STATE_NAMES: Record<SessionState, string> = {
  [SessionState.Idle]: 'IDLE',
  [SessionState.Config]: 'CONFIG',
  [SessionState.Armed]: 'ARMED',
  [SessionState.Sampling]: 'SAMPLING',
  [SessionState.Ready]: 'READY',
  [SessionState.Transmit]: 'TRANSMIT',
  [SessionState.SetParameter]: 'SET_PARAMETER',
  [SessionState.SetSampleRate]: 'SET_SAMPLE_RATE'
};

// ---------------------------------------------------------------------------
// Trigger
// ---------------------------------------------------------------------------

/** Trigger condition codes understood by the detector. */
export enum TriggerType {
  RisingEdge = 0,
  FallingEdge = 1,
  PatternMatch = 2,
  EdgeEither = 3
}

/** Combined trigger setup shared by all channels. */
export interface TriggerConfig {
  /** Channel bits considered by the detector. */
  mask: number;
  /**
   * Raw trigger type code. Codes outside {@link TriggerType} are kept
   * as-is and never fire.
   */
  type: number;
  /** Target levels for PatternMatch. */
  pattern: number;
}

// ---------------------------------------------------------------------------
// Parameter loading
// ---------------------------------------------------------------------------

/** Generator register a SET_FREQUENCY / SET_DUTY_CYCLE load writes to. */
export type ParameterTarget = 'frequency' | 'duty_cycle';
