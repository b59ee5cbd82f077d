// api/_lib/schemas/analysisRequest.ts
import { z } from 'zod';
import { env } from '../env';

/**
 * Request schemas for POST /v1/analyze
 * Version: 1.0.0
 */

const phrase = z.string().trim().min(1, 'Phrases must be non-empty');
const phraseList = z.array(phrase);

// Every tunable of the analysis; anything omitted keeps the data/ default
export const riskConfigOverridesSchema = z.object({
  riskKeywords: phraseList.optional().describe('Terms whose presence marks a message as risk-bearing'),
  dismissivePatterns: phraseList.optional().describe('Phrases that downplay a concern'),
  leadershipRoles: phraseList.optional().describe('Sender identities treated as leadership (exact match)'),
  acknowledgmentPatterns: phraseList.optional().describe('Phrases with which a raiser closes their own concern'),
  doubtMarkers: phraseList.optional().describe('Phrases signalling continued doubt after a concern'),
  stopwords: phraseList.optional().describe('Words ignored by similarity clustering'),
  impactKeywords: z.object({
    high: phraseList,
    medium: phraseList,
    low: phraseList,
  }).partial().optional(),
  riskThemes: z.record(phraseList).optional(),
  similarityThreshold: z.number().min(0).max(1).optional().describe('Cosine similarity at or above which two risk messages are linked'),
  windowMinutes: z.number().positive().max(24 * 60).optional().describe('Communication-gap window width'),
  replyWindowMinutes: z.number().nonnegative().max(24 * 60).optional().describe('How long after a risk message a reply still belongs to its cluster'),
  gapGraceWindows: z.number().int().nonnegative().max(12).optional(),
  sentiment: z.object({
    positiveAbove: z.number().min(-1).max(1),
    negativeBelow: z.number().min(-1).max(1),
  }).partial().optional(),
  severity: z.object({
    mediumFlagRate: z.number().min(0).max(1),
    highFlagRate: z.number().min(0).max(1),
    escalationScore: z.number().min(0).max(10),
  }).partial().optional(),
}).strict();

export type RiskConfigOverrides = z.infer<typeof riskConfigOverridesSchema>;

// Field checks are left to the transcript validator so its errors carry the record index
export const transcriptRecordSchema = z.record(z.unknown());

export const analyzeRequestSchema = z.object({
  messages: z.array(transcriptRecordSchema)
    .max(env.MAX_MESSAGES_PER_REQUEST, `At most ${env.MAX_MESSAGES_PER_REQUEST} messages per request`)
    .describe('Transcript records: timestamp, sender, channel, message'),
  config: riskConfigOverridesSchema.optional().describe('Per-request configuration overrides'),
});

export type AnalyzeRequest = z.infer<typeof analyzeRequestSchema>;
