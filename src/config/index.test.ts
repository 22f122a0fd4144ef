/**
 * Tests for configuration module
 *
 * @module config/index.test
 */

import { describe, it, expect } from '@jest/globals';
import { ZodError } from 'zod';
import { config, parseSettings, getModelConfig } from './index.js';

describe('config', () => {
  it('should load without errors', () => {
    expect(config).toBeDefined();
    expect(config.dataDir.length).toBeGreaterThan(0);
  });

  describe('parseSettings', () => {
    it('should apply defaults for an empty environment', () => {
      const settings = parseSettings({});

      expect(settings.quota).toEqual({
        dailyBudget: 10_000,
        windowMs: 24 * 60 * 60 * 1000,
        aiDailyBudgetUsd: null,
      });
      expect(settings.stalenessWindowMs).toBe(30 * 24 * 60 * 60 * 1000);
      expect(settings.cacheTtlSeconds).toEqual({
        analysis: 604_800,
        channelMeta: 604_800,
        videoList: 86_400,
        urlMapping: 86_400,
      });
      expect(settings.maxSampleSize).toBe(50);
      expect(settings.metadata).toEqual({ maxPages: 10, timeoutMs: 10_000 });
      expect(settings.generation).toEqual({
        modelId: 'gemini-2.5-flash',
        timeoutMs: 30_000,
        maxAttempts: 3,
        enableContextCaching: true,
      });
      expect(settings.maxConcurrentAnalyses).toBe(4);
      expect(settings.degradedMode).toBe(true);
    });

    it('should coerce numeric and boolean strings', () => {
      const settings = parseSettings({
        QUOTA_DAILY_BUDGET: '500',
        QUOTA_WINDOW_HOURS: '1',
        AI_DAILY_BUDGET_USD: '2.5',
        STALENESS_WINDOW_DAYS: '7',
        DEGRADED_MODE: 'no',
        ENABLE_CONTEXT_CACHING: '0',
      });

      expect(settings.quota).toEqual({
        dailyBudget: 500,
        windowMs: 60 * 60 * 1000,
        aiDailyBudgetUsd: 2.5,
      });
      expect(settings.stalenessWindowMs).toBe(7 * 24 * 60 * 60 * 1000);
      expect(settings.degradedMode).toBe(false);
      expect(settings.generation.enableContextCaching).toBe(false);
    });

    it('should honour the model override', () => {
      const settings = parseSettings({ ANALYSIS_MODEL: 'gemini-2.0-flash' });
      expect(settings.generation.modelId).toBe('gemini-2.0-flash');
    });

    it('should reject a non-positive budget', () => {
      expect(() => parseSettings({ QUOTA_DAILY_BUDGET: '0' })).toThrow(ZodError);
    });

    it('should reject an unknown boolean spelling', () => {
      expect(() => parseSettings({ DEGRADED_MODE: 'maybe' })).toThrow(ZodError);
    });
  });

  describe('getModelConfig', () => {
    it('should return the analysis defaults', () => {
      const model = getModelConfig('analysis', {});
      expect(model.modelId).toBe('gemini-2.5-flash');
      expect(model.temperature).toBe(1.0);
    });

    it('should apply the ANALYSIS_MODEL override', () => {
      const model = getModelConfig('analysis', { ANALYSIS_MODEL: 'gemini-2.0-flash' });
      expect(model.modelId).toBe('gemini-2.0-flash');
      expect(model.maxOutputTokens).toBe(2048);
    });
  });
});
