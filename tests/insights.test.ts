import { describe, it, expect } from 'vitest';
import { RiskInsightsBuilder, recommendationsFor } from '../api/_lib/services/insights';
import type { FlaggedMessage, SeverityAssessment } from '../api/_lib/types/riskTypes';
import { testConfig } from './helpers';

const LAST = 'Make sure engineers feel heard when raising technical concerns, to keep early risk detection working.';

function severity(overrides: Partial<SeverityAssessment>): SeverityAssessment {
  return {
    level: 'Low',
    flagRateLevel: 'Low',
    dismissalFactor: 0,
    persistenceFactor: 0,
    impactPotential: 0,
    compositeScore: 0,
    ...overrides,
  };
}

function flagged(index: number, message: string): FlaggedMessage {
  return {
    index,
    timestamp: new Date(Date.UTC(2024, 2, 1, 9, index)),
    sender: 'eng',
    channel: '#eng',
    message,
    reasons: ['RISK_AND_DISMISSIVE'],
    clusterId: null,
  };
}

describe('recommendationsFor', () => {
  it('gives monitoring advice for Low severity', () => {
    const recs = recommendationsFor(severity({}));
    expect(recs).toHaveLength(3);
    expect(recs[0]).toBe('Monitor the situation: check in on the identified areas at upcoming status meetings.');
    expect(recs[2]).toBe(LAST);
  });

  it('adds factor-specific items at 6 and above', () => {
    const recs = recommendationsFor(severity({ level: 'High', dismissalFactor: 6, persistenceFactor: 5, impactPotential: 10 }));
    expect(recs).toHaveLength(6);
    expect(recs).toContain('Review decision-making: evaluate how technical input is weighed in leadership decisions.');
    expect(recs).not.toContain('Schedule a technical deep dive on concerns that engineers raised repeatedly.');
    expect(recs[recs.length - 1]).toBe(LAST);
  });
});

describe('RiskInsightsBuilder.identifyThemes', () => {
  it('counts flagged messages per theme and sorts by count then name', () => {
    const builder = new RiskInsightsBuilder(testConfig());
    expect(builder.identifyThemes([
      flagged(0, 'thermal spike on panel'),
      flagged(1, 'sensor reading drift'),
      flagged(2, 'panel is hot'),
    ])).toEqual([
      { theme: 'Anomalies', count: 2 },
      { theme: 'Thermal Issues', count: 2 },
      { theme: 'Sensor Problems', count: 1 },
    ]);
  });
});
