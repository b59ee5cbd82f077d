// api/_lib/services/riskConfig.ts
import { env } from '../env';
import { withModule } from '../logger';
import { AppValidationError, formatZodError } from '../middleware/errorHandler';
import { riskConfigOverridesSchema, type RiskConfigOverrides } from '../schemas/analysisRequest';
import { dataLoader, type DataLoaderService } from './dataLoader';

const log = withModule('riskConfig');

export interface SentimentLexicon {
  readonly valences: ReadonlyMap<string, number>;
  readonly boosters: ReadonlyMap<string, number>;
  readonly negations: ReadonlySet<string>;
}

export interface ImpactKeywords {
  readonly high: readonly string[];
  readonly medium: readonly string[];
  readonly low: readonly string[];
}

/**
 * Immutable configuration for one analysis run.
 * Built once and handed to every component; nothing reads lexicons from module state.
 */
export interface RiskConfig {
  readonly riskKeywords: readonly string[];
  readonly dismissivePatterns: readonly string[];
  readonly leadershipRoles: ReadonlySet<string>;
  readonly acknowledgmentPatterns: readonly string[];
  readonly doubtMarkers: readonly string[];
  readonly impactKeywords: ImpactKeywords;
  readonly riskThemes: Readonly<Record<string, readonly string[]>>;
  readonly stopwords: ReadonlySet<string>;
  readonly similarityThreshold: number;
  readonly windowMs: number;
  readonly replyWindowMs: number;
  readonly gapGraceWindows: number;
  readonly sentiment: { readonly positiveAbove: number; readonly negativeBelow: number };
  readonly severity: { readonly mediumFlagRate: number; readonly highFlagRate: number; readonly escalationScore: number };
  readonly sentimentLexicon: SentimentLexicon;
}

const MINUTE_MS = 60_000;

function lowerAll(list: readonly string[]): string[] {
  return list.map(s => s.trim().toLowerCase());
}

// Environment knobs are parsed through the same schema as request overrides
export function readEnvOverrides(): RiskConfigOverrides {
  const raw: Record<string, unknown> = {};
  if (env.RISK_SIMILARITY_THRESHOLD) raw.similarityThreshold = Number(env.RISK_SIMILARITY_THRESHOLD);
  if (env.RISK_WINDOW_MINUTES) raw.windowMinutes = Number(env.RISK_WINDOW_MINUTES);
  if (env.RISK_GAP_GRACE_WINDOWS) raw.gapGraceWindows = Number(env.RISK_GAP_GRACE_WINDOWS);
  if (env.RISK_LEADERSHIP_ROLES) {
    raw.leadershipRoles = env.RISK_LEADERSHIP_ROLES.split(',').map(r => r.trim()).filter(Boolean);
  }
  return parseOverrides(raw, 'environment');
}

export function parseOverrides(raw: unknown, source: string = 'request'): RiskConfigOverrides {
  const parsed = riskConfigOverridesSchema.safeParse(raw);
  if (!parsed.success) {
    const { details } = formatZodError(parsed.error);
    throw new AppValidationError(`Invalid configuration overrides (${source})`, details);
  }
  return parsed.data;
}

function mergeOverrides(base: RiskConfigOverrides, top: RiskConfigOverrides): RiskConfigOverrides {
  return {
    ...base,
    ...top,
    impactKeywords: { ...base.impactKeywords, ...top.impactKeywords },
    sentiment: { ...base.sentiment, ...top.sentiment },
    severity: { ...base.severity, ...top.severity },
  };
}

export interface CreateRiskConfigOptions {
  loader?: DataLoaderService;
  /** Apply RISK_* environment overrides beneath the explicit ones (default true). */
  useEnv?: boolean;
}

/**
 * Build a frozen RiskConfig from data/ defaults, environment and explicit overrides
 * (later sources win).
 */
export function createRiskConfig(overrides: RiskConfigOverrides = {}, options: CreateRiskConfigOptions = {}): RiskConfig {
  const loader = options.loader ?? dataLoader;
  const lexicons = loader.getRiskLexicons();
  const defaults = loader.getAnalysisConfig();
  const sentimentFile = loader.getSentimentLexicon();

  const o = mergeOverrides(options.useEnv === false ? {} : readEnvOverrides(), overrides);

  const sentiment = {
    positiveAbove: o.sentiment?.positiveAbove ?? defaults.sentiment.positiveAbove,
    negativeBelow: o.sentiment?.negativeBelow ?? defaults.sentiment.negativeBelow,
  };
  if (sentiment.negativeBelow > sentiment.positiveAbove) {
    throw new AppValidationError('Invalid configuration overrides', [
      { field: 'sentiment', message: 'negativeBelow must not exceed positiveAbove' },
    ]);
  }

  const severity = {
    mediumFlagRate: o.severity?.mediumFlagRate ?? defaults.severity.mediumFlagRate,
    highFlagRate: o.severity?.highFlagRate ?? defaults.severity.highFlagRate,
    escalationScore: o.severity?.escalationScore ?? defaults.severity.escalationScore,
  };
  if (severity.mediumFlagRate > severity.highFlagRate) {
    throw new AppValidationError('Invalid configuration overrides', [
      { field: 'severity', message: 'mediumFlagRate must not exceed highFlagRate' },
    ]);
  }

  const themes = o.riskThemes ?? lexicons.riskThemes;
  const windowMinutes = o.windowMinutes ?? defaults.windowMinutes;

  const config: RiskConfig = {
    riskKeywords: Object.freeze(lowerAll(o.riskKeywords ?? lexicons.riskKeywords)),
    dismissivePatterns: Object.freeze(lowerAll(o.dismissivePatterns ?? lexicons.dismissivePatterns)),
    // Sender identities match exactly, so no case folding here
    leadershipRoles: new Set(o.leadershipRoles ?? lexicons.leadershipRoles),
    acknowledgmentPatterns: Object.freeze(lowerAll(o.acknowledgmentPatterns ?? lexicons.acknowledgmentPatterns)),
    doubtMarkers: Object.freeze(lowerAll(o.doubtMarkers ?? lexicons.doubtMarkers)),
    impactKeywords: Object.freeze({
      high: Object.freeze(lowerAll(o.impactKeywords?.high ?? lexicons.impactKeywords.high)),
      medium: Object.freeze(lowerAll(o.impactKeywords?.medium ?? lexicons.impactKeywords.medium)),
      low: Object.freeze(lowerAll(o.impactKeywords?.low ?? lexicons.impactKeywords.low)),
    }),
    riskThemes: Object.freeze(Object.fromEntries(
      Object.entries(themes).map(([name, words]) => [name, Object.freeze(lowerAll(words))]),
    )),
    stopwords: new Set(lowerAll(o.stopwords ?? lexicons.stopwords)),
    similarityThreshold: o.similarityThreshold ?? defaults.similarityThreshold,
    windowMs: windowMinutes * MINUTE_MS,
    replyWindowMs: (o.replyWindowMinutes ?? defaults.replyWindowMinutes) * MINUTE_MS,
    gapGraceWindows: o.gapGraceWindows ?? defaults.gapGraceWindows,
    sentiment: Object.freeze(sentiment),
    severity: Object.freeze(severity),
    sentimentLexicon: {
      valences: new Map(Object.entries(sentimentFile.valences).map(([w, v]) => [w.toLowerCase(), v])),
      boosters: new Map(Object.entries(sentimentFile.boosters).map(([w, v]) => [w.toLowerCase(), v])),
      negations: new Set(lowerAll(sentimentFile.negations)),
    },
  };

  log.debug('Risk configuration built', {
    riskKeywords: config.riskKeywords.length,
    dismissivePatterns: config.dismissivePatterns.length,
    leadershipRoles: config.leadershipRoles.size,
    similarityThreshold: config.similarityThreshold,
    windowMs: config.windowMs,
  });

  return Object.freeze(config);
}

let defaultConfig: RiskConfig | null = null;

/** Configuration from data/ and the environment, built on first use. */
export function getDefaultRiskConfig(): RiskConfig {
  if (!defaultConfig) defaultConfig = createRiskConfig();
  return defaultConfig;
}

/** JSON-friendly view of a config (sets become sorted arrays, windows in minutes). */
export function describeRiskConfig(config: RiskConfig) {
  return {
    riskKeywords: [...config.riskKeywords],
    dismissivePatterns: [...config.dismissivePatterns],
    leadershipRoles: [...config.leadershipRoles].sort(),
    acknowledgmentPatterns: [...config.acknowledgmentPatterns],
    doubtMarkers: [...config.doubtMarkers],
    impactKeywords: {
      high: [...config.impactKeywords.high],
      medium: [...config.impactKeywords.medium],
      low: [...config.impactKeywords.low],
    },
    riskThemes: Object.fromEntries(Object.entries(config.riskThemes).map(([k, v]) => [k, [...v]])),
    stopwords: [...config.stopwords].sort(),
    similarityThreshold: config.similarityThreshold,
    windowMinutes: config.windowMs / MINUTE_MS,
    replyWindowMinutes: config.replyWindowMs / MINUTE_MS,
    gapGraceWindows: config.gapGraceWindows,
    sentiment: { ...config.sentiment },
    severity: { ...config.severity },
    sentimentLexiconSize: config.sentimentLexicon.valences.size,
  };
}
