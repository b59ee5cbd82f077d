// api/_lib/services/riskPipeline.ts
import { timeStage, withModule, type Logger } from '../logger';
import type { RiskAnalysis } from '../types/riskTypes';
import { CommunicationGapDetector } from './communicationGaps';
import { ConversationAnalyzer } from './conversationAnalyzer';
import { DismissalAnalyzer } from './dismissalAnalyzer';
import { RiskInsightsBuilder } from './insights';
import { KeywordMatcher } from './keywordMatcher';
import { getDefaultRiskConfig, type RiskConfig } from './riskConfig';
import { RiskFlagger } from './riskFlagger';
import { SentimentScorer } from './sentimentScorer';
import { SimilarityClusterer } from './similarityClusterer';
import { toMessages } from './transcript';

const log = withModule('riskPipeline');

/**
 * Stage wiring for one run. Every stage reads the same frozen config;
 * building one pipeline and reusing it across transcripts is safe.
 */
export class RiskPipeline {
  private readonly flagger: RiskFlagger;
  private readonly clusterer: SimilarityClusterer;
  private readonly dismissal: DismissalAnalyzer;
  private readonly gaps: CommunicationGapDetector;
  private readonly conversation: ConversationAnalyzer;
  private readonly insights: RiskInsightsBuilder;

  constructor(readonly config: RiskConfig, private readonly log: Logger = withModule('riskPipeline')) {
    const scorer = new SentimentScorer(config.sentimentLexicon, config.sentiment);
    this.flagger = new RiskFlagger(scorer, new KeywordMatcher(config));
    this.clusterer = new SimilarityClusterer(config);
    this.dismissal = new DismissalAnalyzer(config);
    this.gaps = new CommunicationGapDetector(config);
    this.conversation = new ConversationAnalyzer(config);
    this.insights = new RiskInsightsBuilder(config);
  }

  run(records: readonly unknown[]): RiskAnalysis {
    const messages = timeStage(this.log, 'validation', () => toMessages(records), r => ({ messages: r.length }));
    const scored = timeStage(this.log, 'scoring', () => this.flagger.flagAll(messages), r => ({
      riskMessages: r.filter(m => m.containsRiskWord).length,
    }));
    const components = timeStage(this.log, 'clustering', () => this.clusterer.cluster(scored), r => ({ clusters: r.length }));
    const dismissal = timeStage(this.log, 'dismissal analysis', () => this.dismissal.analyze(scored, components), r => ({
      flagged: r.flaggedMessages.length,
      dismissedConcerns: r.dismissedConcernIndices.length,
    }));
    const communicationGaps = timeStage(this.log, 'gap detection', () => this.gaps.detect(scored), r => ({ gaps: r.length }));
    const stats = timeStage(this.log, 'statistics', () => this.conversation.analyze(
      scored,
      dismissal.flaggedMessages,
      dismissal.clusters,
      communicationGaps,
      dismissal.dismissedConcernIndices.length,
    ), r => ({ severity: r.severity.level }));
    const insights = this.insights.build(scored, dismissal.flaggedMessages, dismissal.dismissedConcernIndices, stats.severity);

    return {
      flaggedMessages: dismissal.flaggedMessages,
      clusters: dismissal.clusters,
      communicationGaps,
      stats,
      insights,
    };
  }
}

export function analyzeTranscript(records: readonly unknown[], config: RiskConfig = getDefaultRiskConfig()): RiskAnalysis {
  return new RiskPipeline(config, log).run(records);
}
