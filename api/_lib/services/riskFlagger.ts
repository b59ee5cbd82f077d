// api/_lib/services/riskFlagger.ts
import type { KeywordMatch, Message, ReasonCode, ScoredMessage } from '../types/riskTypes';
import type { KeywordMatcher } from './keywordMatcher';
import type { SentimentScorer } from './sentimentScorer';

export interface DownplayVerdict {
  isDownplaying: boolean;
  reasons: ReasonCode[];
}

/**
 * (risk AND dismissive) OR (risk AND compound > 0 AND leadership).
 * A compound of exactly 0 is not positive.
 */
export function evaluateDownplaying(match: Pick<KeywordMatch, 'containsRiskWord' | 'isDismissive' | 'isLeadership'>, compoundSentiment: number): DownplayVerdict {
  const reasons: ReasonCode[] = [];
  if (match.containsRiskWord && match.isDismissive) reasons.push('RISK_AND_DISMISSIVE');
  if (match.containsRiskWord && compoundSentiment > 0 && match.isLeadership) reasons.push('RISK_POSITIVE_LEADERSHIP');
  return { isDownplaying: reasons.length > 0, reasons };
}

export class RiskFlagger {
  constructor(
    private readonly scorer: SentimentScorer,
    private readonly matcher: KeywordMatcher,
  ) {}

  flag(message: Message): ScoredMessage {
    const compoundSentiment = this.scorer.score(message.text);
    const match = this.matcher.match(message.text, message.sender);
    const verdict = evaluateDownplaying(match, compoundSentiment);

    return Object.freeze({
      ...message,
      ...match,
      compoundSentiment,
      sentimentLabel: this.scorer.classify(compoundSentiment),
      isDownplaying: verdict.isDownplaying,
      flagReasons: verdict.reasons,
    });
  }

  /** Per-message map; every message is independent, output keeps message order. */
  flagAll(messages: readonly Message[]): ScoredMessage[] {
    return messages
      .map(message => this.flag(message))
      .sort((a, b) => a.index - b.index);
  }
}
