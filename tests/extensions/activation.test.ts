import { describe, it, expect } from 'vitest';
import { decideActivation } from '../../src/extensions/activation.js';
import { Mode } from '../../src/extensions/modes.js';

describe('decideActivation', () => {
  describe('with a two-flag mode set', () => {
    it.each([
      { declared: Mode.PRODUCTION, active: Mode.PRODUCTION, eligible: true },
      { declared: Mode.PRODUCTION, active: Mode.DEVELOPMENT, eligible: false },
      { declared: Mode.DEVELOPMENT, active: Mode.PRODUCTION, eligible: false },
      { declared: Mode.DEVELOPMENT, active: Mode.DEVELOPMENT, eligible: true },
    ])('declared $declared, active $active -> $eligible', ({ declared, active, eligible }) => {
      expect(decideActivation(declared, active).eligible).toBe(eligible);
    });

    it('should match (declared & active) !== 0 for every pair of masks', () => {
      for (let declared = 0; declared <= 3; declared++) {
        for (let active = 0; active <= 3; active++) {
          expect(decideActivation(declared, active).eligible).toBe((declared & active) !== 0);
        }
      }
    });
  });

  describe('mode names', () => {
    it('should list declared modes regardless of the active mode', () => {
      const decision = decideActivation(Mode.PRODUCTION | Mode.DEVELOPMENT, Mode.PLUGIN_DEVELOPMENT);
      expect(decision).toEqual({ eligible: false, modes: ['PRODUCTION', 'DEVELOPMENT'] });
    });

    it('should list nothing for an extension declaring no modes', () => {
      expect(decideActivation(0, 7)).toEqual({ eligible: false, modes: [] });
    });
  });

  describe('hybrid runs', () => {
    it('should activate when any active mode is declared', () => {
      const active = Mode.PRODUCTION | Mode.PLUGIN_DEVELOPMENT;
      expect(decideActivation(Mode.PLUGIN_DEVELOPMENT, active).eligible).toBe(true);
      expect(decideActivation(Mode.DEVELOPMENT, active).eligible).toBe(false);
    });
  });

  describe('default metadata', () => {
    it('should be eligible exactly when the production bit is active', () => {
      for (let active = 0; active <= 7; active++) {
        expect(decideActivation(Mode.PRODUCTION, active).eligible).toBe((active & Mode.PRODUCTION) !== 0);
      }
    });
  });
});
