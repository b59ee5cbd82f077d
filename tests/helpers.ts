import type { RiskConfigOverrides } from '../api/_lib/schemas/analysisRequest';
import {
  KeywordMatcher,
  RiskFlagger,
  SentimentScorer,
  createRiskConfig,
  toMessages,
  type RiskConfig,
  type ScoredMessage,
} from '../api/_lib/services';

export function testConfig(overrides: RiskConfigOverrides = {}): RiskConfig {
  return createRiskConfig(overrides, { useEnv: false });
}

/** Record at 2024-03-01 09:MM:SS UTC */
export function rec(clock: string, sender: string, message: string, channel = '#eng') {
  const time = clock.length === 5 ? `${clock}:00` : clock;
  return { timestamp: `2024-03-01 ${time}`, sender, channel, message };
}

export function scoreAll(records: unknown[], config: RiskConfig = testConfig()): ScoredMessage[] {
  const flagger = new RiskFlagger(
    new SentimentScorer(config.sentimentLexicon, config.sentiment),
    new KeywordMatcher(config),
  );
  return flagger.flagAll(toMessages(records));
}
