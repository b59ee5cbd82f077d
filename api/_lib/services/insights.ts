// api/_lib/services/insights.ts
import type {
  FlaggedMessage,
  ReasonCode,
  RiskInsights,
  RiskTheme,
  ScoredMessage,
  SenderCount,
  SeverityAssessment,
} from '../types/riskTypes';
import { PhraseMatcher } from './keywordMatcher';
import type { RiskConfig } from './riskConfig';

const CONCERN_REASONS: ReadonlySet<ReasonCode> = new Set(['PERSISTENT_UNACKNOWLEDGED', 'CONTINUED_DOUBT']);
const DOWNPLAY_REASONS: ReadonlySet<ReasonCode> = new Set(['RISK_AND_DISMISSIVE', 'RISK_POSITIVE_LEADERSHIP', 'DISMISSED_IN_CLUSTER']);

const FACTOR_ATTENTION = 6;

function rankSenders(counts: Map<string, number>): SenderCount[] {
  return [...counts.entries()]
    .map(([sender, count]) => ({ sender, count }))
    .sort((a, b) => b.count - a.count || a.sender.localeCompare(b.sender));
}

function bump(counts: Map<string, number>, sender: string): void {
  counts.set(sender, (counts.get(sender) ?? 0) + 1);
}

export function recommendationsFor(severity: SeverityAssessment): string[] {
  const recs: string[] = [];

  switch (severity.level) {
    case 'High':
      recs.push('Immediate action required: schedule an engineering review within 24 hours to assess risks to delivery timelines.');
      recs.push('Establish a technical task force led by the engineers who raised concerns, reporting directly to leadership.');
      recs.push('Put safeguards in place against the identified technical risks.');
      break;
    case 'Medium':
      recs.push('Prioritize a technical review: hold a focused discussion with the engineering team within 72 hours.');
      recs.push('Create a structured risk tracking process so technical concerns get visibility and follow-up.');
      recs.push('Review how engineering feedback is escalated through the proper channels.');
      break;
    case 'Low':
      recs.push('Monitor the situation: check in on the identified areas at upcoming status meetings.');
      recs.push('Record the raised concerns in the project risk register.');
      break;
  }

  if (severity.dismissalFactor >= FACTOR_ATTENTION) {
    recs.push('Review decision-making: evaluate how technical input is weighed in leadership decisions.');
  }
  if (severity.persistenceFactor >= FACTOR_ATTENTION) {
    recs.push('Schedule a technical deep dive on concerns that engineers raised repeatedly.');
  }
  if (severity.impactPotential >= FACTOR_ATTENTION) {
    recs.push('Assess the business impact should these issues materialize, including customer, revenue and reputational exposure.');
  }

  recs.push('Make sure engineers feel heard when raising technical concerns, to keep early risk detection working.');
  return recs;
}

export class RiskInsightsBuilder {
  private readonly themes: Array<{ theme: string; matcher: PhraseMatcher }>;

  constructor(config: Pick<RiskConfig, 'riskThemes'>) {
    this.themes = Object.entries(config.riskThemes).map(([theme, words]) => ({ theme, matcher: new PhraseMatcher(words) }));
  }

  /** Themes by the number of flagged messages that mention them. */
  identifyThemes(flagged: readonly FlaggedMessage[]): RiskTheme[] {
    return this.themes
      .map(({ theme, matcher }) => ({ theme, count: flagged.filter(f => matcher.matches(f.message)).length }))
      .filter(t => t.count > 0)
      .sort((a, b) => b.count - a.count || a.theme.localeCompare(b.theme));
  }

  build(
    messages: readonly ScoredMessage[],
    flagged: readonly FlaggedMessage[],
    dismissedConcernIndices: readonly number[],
    severity: SeverityAssessment,
  ): RiskInsights {
    const raisers = new Map<string, number>();
    const downplayers = new Map<string, number>();
    const counted = new Set<number>();

    for (const f of flagged) {
      if (f.reasons.some(r => CONCERN_REASONS.has(r))) {
        bump(raisers, f.sender);
        counted.add(f.index);
      }
      if (f.reasons.some(r => DOWNPLAY_REASONS.has(r))) bump(downplayers, f.sender);
    }
    // Non-leaders whose concern was dismissed raised it even if the concern itself was not flagged
    for (const idx of dismissedConcernIndices) {
      const m = messages[idx];
      if (!m.isLeadership && !counted.has(idx)) bump(raisers, m.sender);
    }

    return {
      themes: this.identifyThemes(flagged),
      concernRaisers: rankSenders(raisers),
      downplayers: rankSenders(downplayers),
      recommendations: recommendationsFor(severity),
    };
  }
}
