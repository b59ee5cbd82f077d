import { describe, it, expect } from 'vitest';
import { evaluateDownplaying } from '../api/_lib/services/riskFlagger';
import { rec, scoreAll } from './helpers';

describe('evaluateDownplaying', () => {
  const risk = { containsRiskWord: true, isDismissive: false, isLeadership: false };

  it('requires a risk word', () => {
    expect(evaluateDownplaying({ ...risk, containsRiskWord: false, isDismissive: true, isLeadership: true }, 0.9))
      .toEqual({ isDownplaying: false, reasons: [] });
  });

  it('flags risk with a dismissive phrase from anyone', () => {
    expect(evaluateDownplaying({ ...risk, isDismissive: true }, -0.5))
      .toEqual({ isDownplaying: true, reasons: ['RISK_AND_DISMISSIVE'] });
  });

  it('flags positive leadership only above zero', () => {
    expect(evaluateDownplaying({ ...risk, isLeadership: true }, 0.01).reasons).toEqual(['RISK_POSITIVE_LEADERSHIP']);
    expect(evaluateDownplaying({ ...risk, isLeadership: true }, 0).isDownplaying).toBe(false);
    expect(evaluateDownplaying({ ...risk, isLeadership: false }, 0.8).isDownplaying).toBe(false);
  });
});

describe('RiskFlagger', () => {
  it('flags a positive leadership message that names a risk', () => {
    const [m] = scoreAll([rec('09:00', 'Director', 'Minor spike, no criticals, all clear')]);
    expect(m.compoundSentiment).toBe(0.3818);
    expect(m.sentimentLabel).toBe('positive');
    expect(m.isDownplaying).toBe(true);
    expect(m.flagReasons).toEqual(['RISK_AND_DISMISSIVE', 'RISK_POSITIVE_LEADERSHIP']);
  });

  it('leaves a plain concern unflagged', () => {
    const [m] = scoreAll([rec('09:00', 'eng', 'We see a thermal deviation, possible anomaly.')]);
    expect(m.sentimentLabel).toBe('negative');
    expect(m.isDownplaying).toBe(false);
    expect(m.flagReasons).toEqual([]);
  });

  it('returns frozen messages in index order', () => {
    const scored = scoreAll([
      rec('09:05', 'eng', 'second'),
      rec('09:00', 'eng', 'first'),
    ]);
    expect(scored.map(m => m.text)).toEqual(['first', 'second']);
    expect(scored.map(m => m.index)).toEqual([0, 1]);
    expect(Object.isFrozen(scored[0])).toBe(true);
  });
});
