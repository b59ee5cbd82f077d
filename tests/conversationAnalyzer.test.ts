import { describe, it, expect } from 'vitest';
import { ConversationAnalyzer, flagRateLevel } from '../api/_lib/services/conversationAnalyzer';
import { testConfig } from './helpers';

const config = testConfig();
const analyzer = new ConversationAnalyzer(config);

describe('flagRateLevel', () => {
  it('uses the configured cut-offs', () => {
    expect(flagRateLevel(0.0499, config.severity)).toBe('Low');
    expect(flagRateLevel(0.05, config.severity)).toBe('Medium');
    expect(flagRateLevel(0.15, config.severity)).toBe('Medium');
    expect(flagRateLevel(0.1501, config.severity)).toBe('High');
  });
});

describe('ConversationAnalyzer.assessSeverity', () => {
  const quiet = { flagRate: 0.01, riskKeywordCount: 0, dismissedConcernCount: 0, clusters: [], flaggedTexts: [] };

  it('stays Low with no signals', () => {
    expect(analyzer.assessSeverity(quiet)).toEqual({
      level: 'Low',
      flagRateLevel: 'Low',
      dismissalFactor: 0,
      persistenceFactor: 0,
      impactPotential: 0,
      compositeScore: 0,
    });
  });

  it('escalates one level when the composite score is high', () => {
    expect(analyzer.assessSeverity({
      flagRate: 0.1,
      riskKeywordCount: 2,
      dismissedConcernCount: 2,
      clusters: [{ hasPersistentConcern: true }],
      flaggedTexts: ['A critical fault'],
    })).toEqual({
      level: 'High',
      flagRateLevel: 'Medium',
      dismissalFactor: 10,
      persistenceFactor: 10,
      impactPotential: 3,
      compositeScore: 7.7,
    });
  });

  it('never goes above High', () => {
    const s = analyzer.assessSeverity({
      flagRate: 0.5,
      riskKeywordCount: 1,
      dismissedConcernCount: 1,
      clusters: [{ hasPersistentConcern: true }],
      flaggedTexts: ['critical', 'critical', 'critical', 'critical'],
    });
    expect(s.level).toBe('High');
    expect(s.impactPotential).toBe(10);
    expect(s.compositeScore).toBe(10);
  });

  it('weights impact tiers and rounds the factors', () => {
    const s = analyzer.assessSeverity({
      ...quiet,
      riskKeywordCount: 3,
      dismissedConcernCount: 1,
      clusters: [{ hasPersistentConcern: true }, { hasPersistentConcern: false }, { hasPersistentConcern: false }],
      flaggedTexts: ['a small but notable and serious drift'],
    });
    expect(s.dismissalFactor).toBe(3);
    expect(s.persistenceFactor).toBe(3);
    expect(s.impactPotential).toBe(6);
    expect(s.compositeScore).toBe(4);
  });
});

describe('ConversationAnalyzer.analyze', () => {
  it('returns empty statistics for an empty conversation', () => {
    const stats = analyzer.analyze([], [], [], [], 0);
    expect(stats).toMatchObject({
      totalMessages: 0,
      perSenderCounts: {},
      perChannelCounts: {},
      meanSentiment: 0,
      sentimentTrend: [],
      timeline: [],
      firstTimestamp: null,
      lastTimestamp: null,
      durationMs: 0,
      flaggedCount: 0,
      flagRate: 0,
      clusterCount: 0,
      communicationGapCount: 0,
    });
    expect(stats.severity.level).toBe('Low');
  });
});
