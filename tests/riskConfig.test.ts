import { afterEach, describe, it, expect } from 'vitest';
import { env } from '../api/_lib/env';
import { createRiskConfig, describeRiskConfig, parseOverrides } from '../api/_lib/services/riskConfig';
import { AppValidationError } from '../api/_lib/middleware/errorHandler';
import { testConfig } from './helpers';

describe('createRiskConfig', () => {
  afterEach(() => {
    env.RISK_SIMILARITY_THRESHOLD = '';
    env.RISK_LEADERSHIP_ROLES = '';
  });

  it('loads defaults from the data directory', () => {
    const config = testConfig();
    expect(config.similarityThreshold).toBe(0.3);
    expect(config.windowMs).toBe(300_000);
    expect(config.replyWindowMs).toBe(300_000);
    expect(config.gapGraceWindows).toBe(0);
    expect(config.leadershipRoles.has('PM_Lead')).toBe(true);
    expect(config.dismissivePatterns).toHaveLength(21);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('applies explicit overrides and lowercases phrases', () => {
    const config = testConfig({ riskKeywords: ['Outage'], similarityThreshold: 0.5, windowMinutes: 10 });
    expect(config.riskKeywords).toEqual(['outage']);
    expect(config.similarityThreshold).toBe(0.5);
    expect(config.windowMs).toBe(600_000);
    expect(config.dismissivePatterns).toHaveLength(21);
  });

  it('merges partial nested overrides with the defaults', () => {
    const config = testConfig({ severity: { escalationScore: 5 } });
    expect(config.severity).toEqual({ mediumFlagRate: 0.05, highFlagRate: 0.15, escalationScore: 5 });
  });

  it('rejects inconsistent cut-offs', () => {
    expect(() => testConfig({ sentiment: { positiveAbove: -0.2 } })).toThrow(AppValidationError);
    expect(() => testConfig({ severity: { mediumFlagRate: 0.5 } })).toThrow(AppValidationError);
  });

  it('layers environment overrides beneath explicit ones', () => {
    env.RISK_SIMILARITY_THRESHOLD = '0.5';
    env.RISK_LEADERSHIP_ROLES = 'Chief, VP';

    const fromEnv = createRiskConfig();
    expect(fromEnv.similarityThreshold).toBe(0.5);
    expect([...fromEnv.leadershipRoles]).toEqual(['Chief', 'VP']);

    expect(createRiskConfig({ similarityThreshold: 0.7 }).similarityThreshold).toBe(0.7);
    expect(createRiskConfig({}, { useEnv: false }).similarityThreshold).toBe(0.3);
  });

  it('rejects an invalid environment value', () => {
    env.RISK_SIMILARITY_THRESHOLD = 'lots';
    expect(() => createRiskConfig()).toThrow(AppValidationError);
  });
});

describe('parseOverrides', () => {
  it('rejects out-of-range and unknown settings', () => {
    expect(() => parseOverrides({ similarityThreshold: 2 })).toThrow(AppValidationError);
    expect(() => parseOverrides({ threshold: 0.4 })).toThrow(AppValidationError);
    expect(() => parseOverrides({ riskKeywords: [''] })).toThrow(AppValidationError);
  });

  it('passes valid overrides through', () => {
    expect(parseOverrides({ gapGraceWindows: 2 })).toEqual({ gapGraceWindows: 2 });
  });
});

describe('describeRiskConfig', () => {
  it('reports windows in minutes and sorted roles', () => {
    const view = describeRiskConfig(testConfig());
    expect(view.windowMinutes).toBe(5);
    expect(view.replyWindowMinutes).toBe(5);
    expect(view.leadershipRoles).toEqual(['Director', 'PM_Lead', 'QA_Tech', 'Systems_Admin']);
  });
});
