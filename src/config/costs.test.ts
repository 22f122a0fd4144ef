/**
 * Tests for cost configuration
 *
 * @module config/costs.test
 */

import { describe, it, expect } from '@jest/globals';
import {
  QUOTA_COSTS,
  TOKEN_COSTS,
  calculateTokenCost,
  calculateQuotaUnits,
  formatCost,
} from './costs.js';

describe('costs', () => {
  describe('QUOTA_COSTS', () => {
    it('should charge one unit for list calls', () => {
      expect(QUOTA_COSTS.channels).toBe(1);
      expect(QUOTA_COSTS.playlistItems).toBe(1);
      expect(QUOTA_COSTS.videos).toBe(1);
    });

    it('should charge 100 units for search', () => {
      expect(QUOTA_COSTS.search).toBe(100);
    });
  });

  describe('calculateQuotaUnits', () => {
    it('should multiply by call count', () => {
      expect(calculateQuotaUnits('playlistItems', 10)).toBe(10);
      expect(calculateQuotaUnits('search', 2)).toBe(200);
    });

    it('should default to a single call', () => {
      expect(calculateQuotaUnits('channels')).toBe(1);
    });
  });

  describe('calculateTokenCost', () => {
    it('should price input and output per million tokens', () => {
      const cost = calculateTokenCost('gemini', {
        inputTokens: 1_000_000,
        outputTokens: 1_000_000,
        cachedInputTokens: 0,
      });
      expect(cost).toBeCloseTo(
        TOKEN_COSTS.gemini.inputPerMillion + TOKEN_COSTS.gemini.outputPerMillion,
        10
      );
    });

    it('should bill cached input at the discounted rate only', () => {
      const cost = calculateTokenCost('gemini', {
        inputTokens: 1_000_000,
        outputTokens: 0,
        cachedInputTokens: 1_000_000,
      });
      expect(cost).toBeCloseTo(TOKEN_COSTS.gemini.cachedInputPerMillion, 10);
    });

    it('should never count more cached tokens than input tokens', () => {
      const cost = calculateTokenCost('gemini', {
        inputTokens: 1_000_000,
        outputTokens: 0,
        cachedInputTokens: 5_000_000,
      });
      expect(cost).toBeCloseTo(0.075, 10);
    });

    it('should return zero for no usage', () => {
      expect(
        calculateTokenCost('gemini', { inputTokens: 0, outputTokens: 0, cachedInputTokens: 0 })
      ).toBe(0);
    });
  });

  describe('formatCost', () => {
    it('should show four decimals below one cent', () => {
      expect(formatCost(0.0045)).toBe('$0.0045');
    });

    it('should show two decimals otherwise', () => {
      expect(formatCost(1.5)).toBe('$1.50');
    });
  });
});
