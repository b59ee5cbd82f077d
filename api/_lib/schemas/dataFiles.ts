// api/_lib/schemas/dataFiles.ts
import { z } from 'zod';

/**
 * Schemas for the JSON files under data/.
 * Loaded once by the DataLoader and validated before any component sees them.
 */

const phraseList = z.array(z.string().min(1));

export const riskLexiconsFileSchema = z.object({
  version: z.string(),
  riskKeywords: phraseList,
  dismissivePatterns: phraseList,
  leadershipRoles: phraseList,
  acknowledgmentPatterns: phraseList.default([]),
  doubtMarkers: phraseList.default([]),
  impactKeywords: z.object({
    high: phraseList,
    medium: phraseList,
    low: phraseList,
  }),
  riskThemes: z.record(phraseList).default({}),
  stopwords: phraseList.default([]),
});

export type RiskLexiconsFile = z.infer<typeof riskLexiconsFileSchema>;

export const sentimentLexiconFileSchema = z.object({
  version: z.string(),
  valences: z.record(z.number().min(-4).max(4)),
  boosters: z.record(z.number()),
  negations: phraseList,
});

export type SentimentLexiconFile = z.infer<typeof sentimentLexiconFileSchema>;

export const analysisConfigFileSchema = z.object({
  version: z.string(),
  similarityThreshold: z.number().min(0).max(1),
  windowMinutes: z.number().positive(),
  replyWindowMinutes: z.number().nonnegative(),
  gapGraceWindows: z.number().int().nonnegative(),
  sentiment: z.object({
    positiveAbove: z.number(),
    negativeBelow: z.number(),
  }),
  severity: z.object({
    mediumFlagRate: z.number().min(0).max(1),
    highFlagRate: z.number().min(0).max(1),
    escalationScore: z.number().min(0).max(10),
  }),
});

export type AnalysisConfigFile = z.infer<typeof analysisConfigFileSchema>;
