// api/_lib/types/dataTypes.ts
// TypeScript shapes for the JSON data files (schemas live in ../schemas/dataFiles)
import type { RiskLexiconsFile, SentimentLexiconFile, AnalysisConfigFile } from '../schemas/dataFiles';

export type { RiskLexiconsFile, SentimentLexiconFile, AnalysisConfigFile };

export interface DataCache {
  riskLexicons?: RiskLexiconsFile;
  sentimentLexicon?: SentimentLexiconFile;
  analysisConfig?: AnalysisConfigFile;
}

export type DataFileKey = keyof DataCache;
