// api/_lib/services/dataLoader.ts
import * as fs from 'fs';
import * as path from 'path';
import type { z } from 'zod';
import { logger } from '../logger';
import { env } from '../env';
import { AppError, formatZodError } from '../middleware/errorHandler';
import {
  riskLexiconsFileSchema,
  sentimentLexiconFileSchema,
  analysisConfigFileSchema,
} from '../schemas/dataFiles';
import type {
  DataCache,
  DataFileKey,
  RiskLexiconsFile,
  SentimentLexiconFile,
  AnalysisConfigFile,
} from '../types/dataTypes';

const DATA_FILES: { [K in DataFileKey]: { filename: string; schema: z.ZodType<NonNullable<DataCache[K]>, z.ZodTypeDef, unknown> } } = {
  riskLexicons:     { filename: 'risk_lexicons.json',     schema: riskLexiconsFileSchema },
  sentimentLexicon: { filename: 'sentiment_lexicon.json', schema: sentimentLexiconFileSchema },
  analysisConfig:   { filename: 'analysis_config.json',   schema: analysisConfigFileSchema },
};

export class DataLoaderService {
  private cache: DataCache = {};
  private dataPath: string;

  constructor(dataDir?: string) {
    const possiblePaths = [
      dataDir,
      env.RISK_DATA_DIR || undefined,
      path.resolve(__dirname, '../../../data'),     // api/_lib/services/ -> data/
      path.resolve(__dirname, '../../../../data'),  // dist/api/_lib/services/ -> data/
      path.resolve(process.cwd(), 'data'),          // From project root
    ].filter((p): p is string => typeof p === 'string' && p.length > 0);

    // Find the first path that exists
    this.dataPath = possiblePaths.find(p => fs.existsSync(p)) || possiblePaths[0];

    logger.debug(`DataLoader initialized with path: ${this.dataPath}`, { checked: possiblePaths });
  }

  getDataPath(): string {
    return this.dataPath;
  }

  // No fallback on purpose: an empty lexicon would silently disable detection
  private readJson<K extends DataFileKey>(key: K): NonNullable<DataCache[K]> {
    const { filename, schema } = DATA_FILES[key];
    const filepath = path.join(this.dataPath, filename);

    if (!fs.existsSync(filepath)) {
      throw new AppError(`Data file not found: ${filepath}`, 500, 'ERR_DATA_FILE', false);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filepath, 'utf-8'));
    } catch (error) {
      logger.error(`Error parsing ${filename}`, error);
      throw new AppError(`Data file is not valid JSON: ${filename}`, 500, 'ERR_DATA_FILE', false);
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      const { details } = formatZodError(parsed.error);
      logger.error(`Schema validation failed for ${filename}`, { details });
      throw new AppError(`Data file failed validation: ${filename}`, 500, 'ERR_DATA_FILE', false);
    }

    logger.debug(`Successfully loaded ${filename}`);
    return parsed.data;
  }

  private load<K extends DataFileKey>(key: K): NonNullable<DataCache[K]> {
    const cached = this.cache[key];
    if (cached) return cached;
    const loaded = this.readJson(key);
    this.cache[key] = loaded;
    return loaded;
  }

  getRiskLexicons(): RiskLexiconsFile {
    return this.load('riskLexicons');
  }

  getSentimentLexicon(): SentimentLexiconFile {
    return this.load('sentimentLexicon');
  }

  getAnalysisConfig(): AnalysisConfigFile {
    return this.load('analysisConfig');
  }

  clearCache(): void {
    this.cache = {};
  }
}

// Shared instance
export const dataLoader = new DataLoaderService();
