import { intersects, modeNames, type ModeMask, type ModeName } from './modes.js';

export interface ActivationDecision {
  /** Whether the extension may be activated under the active mode */
  eligible: boolean;
  /** Every mode the extension declares, whether active or not */
  modes: ModeName[];
}

/**
 * Decide whether an extension runs under the active mode
 *
 * Eligible when the declared and active masks share a bit. The mode list is
 * derived from the declared mask alone, for reporting.
 *
 * @param declared - The extension's `loadIfMode`
 * @param active - The process's active mode mask
 */
export function decideActivation(declared: ModeMask, active: ModeMask): ActivationDecision {
  return {
    eligible: intersects(declared, active),
    modes: modeNames(declared),
  };
}
