/**
 * Tests for configuration loading
 */

import { describe, it, expect } from 'vitest';
import { loadConfig, requireSetting } from '../../src/lib/config';
import { ValidationError } from '../../src/lib/errors';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({});

    expect(config.schedule).toEqual({
      timezone: 'UTC',
      minPostIntervalHours: 1,
      maxDailyPosts: 10,
      dailyLookbackHours: 24,
      weeklyMinIntervalHours: 144,
      weeklyLookbackDays: 7,
    });
    expect(config.retry).toEqual({ maxAttempts: 3, backoffBaseMs: 1000, backoffFactor: 4 });
    expect(config.format).toEqual({
      projectName: 'Project',
      hashtags: ['#opensource'],
      limits: { microblog_a: 500, microblog_b: 280 },
    });
    expect(config.filter.chatMinLength).toBe(20);
    expect(config.filter.chatKeywords).toContain('release');
  });

  it('parses numbers and comma-separated lists', () => {
    const config = loadConfig({
      MAX_DAILY_POSTS: '3',
      PROJECT_HASHTAGS: ' #acme , #opensource ,',
      CHAT_KEYWORDS: 'Release,Launch',
      TIMEZONE: 'Europe/Berlin',
    });

    expect(config.schedule.maxDailyPosts).toBe(3);
    expect(config.schedule.timezone).toBe('Europe/Berlin');
    expect(config.format.hashtags).toEqual(['#acme', '#opensource']);
    expect(config.filter.chatKeywords).toEqual(['release', 'launch']);
  });

  it('compiles noise patterns case-insensitively', () => {
    const config = loadConfig({ CHAT_NOISE_PATTERNS: '^gm$' });
    expect(config.filter.chatNoisePatterns.map((p) => p.test('GM'))).toEqual([true]);
  });

  it('rejects an unknown time zone', () => {
    expect(() => loadConfig({ TIMEZONE: 'Mars/Olympus' })).toThrow(new ValidationError('Invalid TIMEZONE: Mars/Olympus'));
  });

  it('rejects malformed numbers', () => {
    expect(() => loadConfig({ MAX_DAILY_POSTS: 'many' })).toThrow(ValidationError);
  });

  it('rejects an invalid noise pattern', () => {
    expect(() => loadConfig({ CHAT_NOISE_PATTERNS: '(' })).toThrow('Invalid CHAT_NOISE_PATTERNS entry: (');
  });
});

describe('requireSetting', () => {
  it('returns a configured value', () => {
    expect(requireSetting(loadConfig({ GITHUB_TOKEN: 'test-token' }), 'GITHUB_TOKEN')).toBe('test-token');
  });

  it('treats blank values as missing', () => {
    expect(() => requireSetting(loadConfig({ GITHUB_TOKEN: '  ' }), 'GITHUB_TOKEN')).toThrow(
      'GITHUB_TOKEN environment variable is required'
    );
  });
});
