// api/_lib/services/index.ts
export { dataLoader, DataLoaderService } from './dataLoader';
export { createRiskConfig, getDefaultRiskConfig, describeRiskConfig, parseOverrides, type RiskConfig } from './riskConfig';
export { toMessages, parseTimestamp, type TranscriptRecord } from './transcript';
export { SentimentScorer, classifySentiment } from './sentimentScorer';
export { KeywordMatcher, PhraseMatcher } from './keywordMatcher';
export { RiskFlagger, evaluateDownplaying } from './riskFlagger';
export { SimilarityClusterer, cosineSimilarity } from './similarityClusterer';
export { DismissalAnalyzer } from './dismissalAnalyzer';
export { CommunicationGapDetector } from './communicationGaps';
export { ConversationAnalyzer } from './conversationAnalyzer';
export { RiskInsightsBuilder } from './insights';
export { RiskPipeline, analyzeTranscript } from './riskPipeline';
export { logger } from '../logger';
export * from '../types/riskTypes';
