import { describe, it, expect } from 'vitest';
import { DismissalAnalyzer } from '../api/_lib/services/dismissalAnalyzer';
import { SimilarityClusterer } from '../api/_lib/services/similarityClusterer';
import { rec, scoreAll, testConfig } from './helpers';

const config = testConfig();
const CONCERN = 'Seeing a thermal spike on panel 3';

function analyze(records: unknown[]) {
  const scored = scoreAll(records, config);
  const components = new SimilarityClusterer(config).cluster(scored);
  return new DismissalAnalyzer(config).analyze(scored, components);
}

describe('DismissalAnalyzer', () => {
  it('tags the dismissive reply to a concern', () => {
    const result = analyze([
      rec('09:00', 'eng', 'We see a thermal deviation, possible anomaly.'),
      rec('09:02', 'PM_Lead', 'Not a big deal, within tolerance.'),
    ]);

    expect(result.clusters).toHaveLength(1);
    expect(result.clusters[0]).toMatchObject({
      id: 0,
      memberIndices: [0],
      responseIndices: [1],
      hasDismissal: true,
      hasPersistentConcern: false,
      dismissedConcernCount: 1,
    });
    expect(result.flaggedMessages).toHaveLength(1);
    expect(result.flaggedMessages[0]).toMatchObject({
      index: 1,
      sender: 'PM_Lead',
      reasons: ['DISMISSED_IN_CLUSTER'],
      clusterId: 0,
    });
    expect(result.dismissedConcernIndices).toEqual([0]);
  });

  it('ignores replies outside the reply window', () => {
    const result = analyze([
      rec('09:00', 'eng', 'We see a thermal deviation, possible anomaly.'),
      rec('09:06', 'PM_Lead', 'Not a big deal, within tolerance.'),
    ]);
    expect(result.clusters[0].responseIndices).toEqual([]);
    expect(result.flaggedMessages).toEqual([]);
  });

  it('flags a repeated concern nobody answered', () => {
    const result = analyze([
      rec('09:00', 'eng1', CONCERN),
      rec('09:01', 'eng2', 'Thermal spike on panel 3 again'),
    ]);
    expect(result.clusters[0].hasPersistentConcern).toBe(true);
    expect(result.flaggedMessages.map(f => [f.index, f.reasons])).toEqual([[1, ['PERSISTENT_UNACKNOWLEDGED']]]);
  });

  it('resets persistence after an adequate leadership response', () => {
    const result = analyze([
      rec('09:00', 'eng1', CONCERN),
      rec('09:00:30', 'Director', 'Thanks, looking into the panel readings now'),
      rec('09:01', 'eng2', 'Thermal spike on panel 3 again'),
    ]);
    expect(result.clusters[0].hasPersistentConcern).toBe(false);
    expect(result.flaggedMessages).toEqual([]);
  });

  it('does not count a dismissal once the raiser acknowledged', () => {
    const result = analyze([
      rec('09:00', 'eng1', CONCERN),
      rec('09:01', 'eng1', 'Never mind, false alarm'),
      rec('09:02', 'PM_Lead', 'No need to worry'),
    ]);
    expect(result.flaggedMessages).toEqual([]);
    expect(result.dismissedConcernIndices).toEqual([]);
  });

  it('flags doubt voiced after a dismissal', () => {
    const result = analyze([
      rec('09:00', 'eng1', CONCERN),
      rec('09:01', 'PM_Lead', 'Not a big deal'),
      rec('09:02', 'eng1', 'I guess, still not convinced'),
    ]);
    expect(result.flaggedMessages.map(f => [f.index, f.reasons, f.clusterId])).toEqual([
      [1, ['DISMISSED_IN_CLUSTER'], 0],
      [2, ['CONTINUED_DOUBT'], 0],
    ]);
  });

  it('treats upbeat leadership talk about the risk as a dismissal', () => {
    const result = analyze([
      rec('09:00', 'eng1', CONCERN),
      rec('09:01', 'Director', 'Thermal spike on panel 3 looks fine'),
    ]);
    expect(result.clusters[0].memberIndices).toEqual([0, 1]);
    expect(result.flaggedMessages.map(f => [f.index, f.reasons])).toEqual([
      [1, ['RISK_POSITIVE_LEADERSHIP', 'DISMISSED_IN_CLUSTER']],
    ]);
  });

  it('returns empty results for no clusters', () => {
    expect(analyze([])).toEqual({ clusters: [], flaggedMessages: [], dismissedConcernIndices: [] });
  });
});
