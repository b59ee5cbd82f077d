// api/_lib/types/riskTypes.ts
// Shapes that flow through the risk detection pipeline

export type SentimentLabel = 'positive' | 'neutral' | 'negative';

export type SeverityLevel = 'Low' | 'Medium' | 'High';

export const REASON_CODES = [
  'RISK_AND_DISMISSIVE',
  'RISK_POSITIVE_LEADERSHIP',
  'DISMISSED_IN_CLUSTER',
  'PERSISTENT_UNACKNOWLEDGED',
  'CONTINUED_DOUBT',
] as const;

export type ReasonCode = typeof REASON_CODES[number];

/** One validated transcript line. `index` is its position after sorting by time. */
export interface Message {
  readonly index: number;
  readonly sourceIndex: number;
  readonly timestamp: Date;
  readonly sender: string;
  readonly channel: string;
  readonly text: string;
}

export interface KeywordMatch {
  containsRiskWord: boolean;
  isDismissive: boolean;
  isLeadership: boolean;
  isAcknowledgment: boolean;
  expressesDoubt: boolean;
  riskTerms: string[];
  dismissiveTerms: string[];
}

export interface ScoredMessage extends Message, KeywordMatch {
  readonly compoundSentiment: number;
  readonly sentimentLabel: SentimentLabel;
  readonly isDownplaying: boolean;
  /** Reasons contributed by the per-message flagger. */
  readonly flagReasons: ReasonCode[];
}

export interface RiskCluster {
  id: number;
  /** Risk-keyword messages, ascending by timestamp. */
  memberIndices: number[];
  /** Non-risk messages that replied to a member within the reply window. */
  responseIndices: number[];
  startTime: Date;
  endTime: Date;
  hasDismissal: boolean;
  hasPersistentConcern: boolean;
  dismissedConcernCount: number;
}

export interface FlaggedMessage {
  index: number;
  timestamp: Date;
  sender: string;
  channel: string;
  message: string;
  reasons: ReasonCode[];
  clusterId: number | null;
}

export interface CommunicationGap {
  windowStart: Date;
  windowEnd: Date;
  concernedSenders: string[];
  concernIndices: number[];
  /** Leadership messages seen in the window, none of which was an adequate response. */
  responseIndices: number[];
  leadershipResponded: false;
  dismissiveResponse: boolean;
}

export interface SeverityAssessment {
  level: SeverityLevel;
  flagRateLevel: SeverityLevel;
  dismissalFactor: number;
  persistenceFactor: number;
  impactPotential: number;
  compositeScore: number;
}

export interface TimelinePoint {
  index: number;
  timestamp: Date;
  sender: string;
  compoundSentiment: number;
  flagged: boolean;
}

export interface ConversationStats {
  totalMessages: number;
  perSenderCounts: Record<string, number>;
  perChannelCounts: Record<string, number>;
  meanSentiment: number;
  sentimentTrend: number[];
  timeline: TimelinePoint[];
  firstTimestamp: Date | null;
  lastTimestamp: Date | null;
  durationMs: number;
  riskKeywordCount: number;
  dismissiveCount: number;
  leadershipMessageCount: number;
  flaggedCount: number;
  flagRate: number;
  clusterCount: number;
  communicationGapCount: number;
  severity: SeverityAssessment;
}

export interface RiskTheme {
  theme: string;
  count: number;
}

export interface SenderCount {
  sender: string;
  count: number;
}

export interface RiskInsights {
  themes: RiskTheme[];
  concernRaisers: SenderCount[];
  downplayers: SenderCount[];
  recommendations: string[];
}

export interface RiskAnalysis {
  flaggedMessages: FlaggedMessage[];
  clusters: RiskCluster[];
  communicationGaps: CommunicationGap[];
  stats: ConversationStats;
  insights: RiskInsights;
}
