// api/_lib/services/conversationAnalyzer.ts
import type {
  CommunicationGap,
  ConversationStats,
  FlaggedMessage,
  RiskCluster,
  ScoredMessage,
  SeverityAssessment,
  SeverityLevel,
} from '../types/riskTypes';
import { PhraseMatcher } from './keywordMatcher';
import type { RiskConfig } from './riskConfig';

const LEVELS: SeverityLevel[] = ['Low', 'Medium', 'High'];

export interface SeverityInputs {
  flagRate: number;
  riskKeywordCount: number;
  dismissedConcernCount: number;
  clusters: readonly Pick<RiskCluster, 'hasPersistentConcern'>[];
  flaggedTexts: readonly string[];
}

function round(n: number, places: number): number {
  const f = 10 ** places;
  return Math.round(n * f) / f;
}

function countBy<T>(items: readonly T[], key: (item: T) => string): Record<string, number> {
  const out: Record<string, number> = {};
  for (const item of items) {
    const k = key(item);
    out[k] = (out[k] ?? 0) + 1;
  }
  return out;
}

export function flagRateLevel(flagRate: number, cutoffs: RiskConfig['severity']): SeverityLevel {
  if (flagRate < cutoffs.mediumFlagRate) return 'Low';
  if (flagRate <= cutoffs.highFlagRate) return 'Medium';
  return 'High';
}

export class ConversationAnalyzer {
  private readonly impact: { high: PhraseMatcher; medium: PhraseMatcher; low: PhraseMatcher };

  constructor(private readonly config: Pick<RiskConfig, 'severity' | 'impactKeywords'>) {
    this.impact = {
      high: new PhraseMatcher(config.impactKeywords.high),
      medium: new PhraseMatcher(config.impactKeywords.medium),
      low: new PhraseMatcher(config.impactKeywords.low),
    };
  }

  /**
   * Factors are on a 0-10 scale:
   * - dismissal: share of risk messages whose concern was later dismissed
   * - persistence: share of clusters holding a repeated unacknowledged concern
   * - impact: 3 per flagged message naming a high-impact word, 2 medium, 1 low (capped)
   * The flag-rate level is raised one step when their mean reaches the escalation score.
   */
  assessSeverity(inputs: SeverityInputs): SeverityAssessment {
    const dismissalFactor = inputs.riskKeywordCount > 0
      ? Math.round((10 * inputs.dismissedConcernCount) / inputs.riskKeywordCount)
      : 0;
    const persistent = inputs.clusters.filter(c => c.hasPersistentConcern).length;
    const persistenceFactor = inputs.clusters.length > 0
      ? Math.round((10 * persistent) / inputs.clusters.length)
      : 0;

    let high = 0, medium = 0, low = 0;
    for (const text of inputs.flaggedTexts) {
      if (this.impact.high.matches(text)) high++;
      if (this.impact.medium.matches(text)) medium++;
      if (this.impact.low.matches(text)) low++;
    }
    const impactPotential = Math.min(10, high * 3 + medium * 2 + low);

    const compositeScore = round((dismissalFactor + persistenceFactor + impactPotential) / 3, 1);
    const base = flagRateLevel(inputs.flagRate, this.config.severity);
    const escalate = compositeScore >= this.config.severity.escalationScore ? 1 : 0;
    const level = LEVELS[Math.min(LEVELS.length - 1, LEVELS.indexOf(base) + escalate)];

    return { level, flagRateLevel: base, dismissalFactor, persistenceFactor, impactPotential, compositeScore };
  }

  analyze(
    messages: readonly ScoredMessage[],
    flagged: readonly FlaggedMessage[],
    clusters: readonly RiskCluster[],
    gaps: readonly CommunicationGap[],
    dismissedConcernCount: number,
  ): ConversationStats {
    const total = messages.length;
    const flaggedIndices = new Set(flagged.map(f => f.index));
    const riskKeywordCount = messages.filter(m => m.containsRiskWord).length;
    const flagRate = total > 0 ? flagged.length / total : 0;

    // Outputs get their own Date copies; Messages stay frozen
    const first = total > 0 ? new Date(messages[0].timestamp.getTime()) : null;
    const last = total > 0 ? new Date(messages[total - 1].timestamp.getTime()) : null;
    const sentimentSum = messages.reduce((acc, m) => acc + m.compoundSentiment, 0);

    return {
      totalMessages: total,
      perSenderCounts: countBy(messages, m => m.sender),
      perChannelCounts: countBy(messages, m => m.channel),
      meanSentiment: total > 0 ? round(sentimentSum / total, 4) : 0,
      sentimentTrend: messages.map(m => m.compoundSentiment),
      timeline: messages.map(m => ({
        index: m.index,
        timestamp: new Date(m.timestamp.getTime()),
        sender: m.sender,
        compoundSentiment: m.compoundSentiment,
        flagged: flaggedIndices.has(m.index),
      })),
      firstTimestamp: first,
      lastTimestamp: last,
      durationMs: first && last ? last.getTime() - first.getTime() : 0,
      riskKeywordCount,
      dismissiveCount: messages.filter(m => m.isDismissive).length,
      leadershipMessageCount: messages.filter(m => m.isLeadership).length,
      flaggedCount: flagged.length,
      flagRate,
      clusterCount: clusters.length,
      communicationGapCount: gaps.length,
      severity: this.assessSeverity({
        flagRate,
        riskKeywordCount,
        dismissedConcernCount,
        clusters,
        flaggedTexts: flagged.map(f => f.message),
      }),
    };
  }
}
