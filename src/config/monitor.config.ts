import { validateSync, type ValidationError } from 'class-validator';
import { MonitorSettingsDto } from '../application/dto/monitor-settings.dto';
import { ConfigError } from '../shared/errors';
import { Logger } from '../shared/logger';
import { EnvReader } from './env.reader';

export const DEFAULT_SOCIAL_TERMS = ['bitcoin', 'crypto', 'ethereum', 'altcoin', 'nft'] as const;

export interface ThresholdConfig {
  readonly btcDominanceFloor: number;
  readonly m2FlatEpsilon: number;
  readonly m2FlatWindow: number;
  readonly altPullbackRatio: number;
  readonly altPullbackWindowDays: number;
  readonly trendHitsRequired: number;
  readonly socialTerms: readonly string[];
}

export interface EndpointConfig {
  readonly coinGeckoGlobalUrl: string;
  readonly fredObservationsUrl: string;
  readonly fredApiKey: string;
  readonly fredSeriesId: string;
  readonly appStoreRssUrl: string;
  readonly fearGreedUrl: string;
  readonly googleTrendsUrl: string;
  readonly timeoutMs: number;
}

export interface EmailConfig {
  readonly address: string;
  readonly password: string;
  readonly to: string;
  readonly smtpHost: string;
  readonly smtpPort: number;
  readonly smtpSecure: boolean;
}

export interface HistoryConfig {
  readonly filePath: string;
  readonly maxSamples: number;
}

export interface ChartConfig {
  readonly enabled: boolean;
  readonly maxPoints: number;
}

export interface MonitorConfig {
  readonly thresholds: ThresholdConfig;
  readonly endpoints: EndpointConfig;
  readonly email: EmailConfig;
  readonly history: HistoryConfig;
  readonly charts: ChartConfig;
  readonly dryRun: boolean;
}

const logger = new Logger('MonitorConfig');

function readSettings(reader: EnvReader): MonitorSettingsDto {
  const settings = new MonitorSettingsDto();
  settings.emailAddress = reader.string('EMAIL_ADDRESS', '');
  settings.emailPassword = reader.string('EMAIL_PASSWORD', '');
  settings.emailTo = reader.string('EMAIL_TO', settings.emailAddress);
  settings.smtpHost = reader.string('SMTP_HOST', 'smtp.gmail.com');
  settings.smtpPort = reader.int('SMTP_PORT', 587);
  settings.smtpSecure = reader.bool('SMTP_SECURE', false);
  settings.fredApiKey = reader.string('FRED_API_KEY', '');
  settings.fredSeriesId = reader.string('FRED_SERIES_ID', 'M2NS');

  settings.btcDominanceFloor = reader.float('BTC_DOM_THRESHOLD', 45.0);
  settings.m2FlatEpsilon = reader.float('M2_FLAT_THRESHOLD', 0.001);
  settings.m2FlatWindow = reader.int('M2_FLAT_WINDOW', 3);
  settings.altPullbackRatio = reader.float('ALT_PULLBACK', 0.9);
  settings.altPullbackWindowDays = reader.float('ALT_PULLBACK_WINDOW_DAYS', 30);
  settings.trendHitsRequired = reader.int('TRENDS_HITS_REQ', 2);
  settings.socialTerms = reader.list('SOCIAL_TERMS', DEFAULT_SOCIAL_TERMS);

  settings.coinGeckoGlobalUrl = reader.string(
    'COINGECKO_GLOBAL_API',
    'https://api.coingecko.com/api/v3/global',
  );
  settings.fredObservationsUrl = reader.string(
    'FRED_API',
    'https://api.stlouisfed.org/fred/series/observations',
  );
  settings.appStoreRssUrl = reader.string(
    'APP_STORE_RSS',
    'https://rss.applemarketingtools.com/api/v2/us/apps/top-free/10/apps.json',
  );
  settings.fearGreedUrl = reader.string('FEAR_GREED_API', 'https://api.alternative.me/fng/?limit=1');
  settings.googleTrendsUrl = reader.string(
    'GOOGLE_TRENDS_API',
    'https://trends.google.com/trends/api/dailytrends?hl=en-US&tz=-480&geo=US&ns=15',
  );

  settings.historyFile = reader.string('HISTORY_FILE', 'alt_history.json');
  settings.historyMaxSamples = reader.int('HISTORY_MAX_SAMPLES', 500);
  settings.fetchTimeoutMs = reader.int('FETCH_TIMEOUT_MS', 10_000);
  settings.chartsEnabled = reader.bool('CHARTS_ENABLED', true);
  settings.chartMaxPoints = reader.int('CHART_MAX_POINTS', 90);
  settings.dryRun = reader.bool('DRY_RUN', false);
  return settings;
}

function flattenViolations(errors: ValidationError[]): string[] {
  return errors.flatMap((error) => Object.values(error.constraints ?? {}));
}

/**
 * Builds the immutable run configuration from environment variables.
 * Throws ConfigError when a parsed value violates its constraints.
 */
export function loadMonitorConfig(env: NodeJS.ProcessEnv = process.env): MonitorConfig {
  const reader = new EnvReader(env);
  const settings = readSettings(reader);

  for (const warning of reader.warnings) {
    logger.warn(warning);
  }

  const violations = flattenViolations(validateSync(settings));
  if (violations.length > 0) {
    throw new ConfigError(violations);
  }

  return Object.freeze({
    thresholds: Object.freeze({
      btcDominanceFloor: settings.btcDominanceFloor,
      m2FlatEpsilon: settings.m2FlatEpsilon,
      m2FlatWindow: settings.m2FlatWindow,
      altPullbackRatio: settings.altPullbackRatio,
      altPullbackWindowDays: settings.altPullbackWindowDays,
      trendHitsRequired: settings.trendHitsRequired,
      socialTerms: Object.freeze([...settings.socialTerms]),
    }),
    endpoints: Object.freeze({
      coinGeckoGlobalUrl: settings.coinGeckoGlobalUrl,
      fredObservationsUrl: settings.fredObservationsUrl,
      fredApiKey: settings.fredApiKey,
      fredSeriesId: settings.fredSeriesId,
      appStoreRssUrl: settings.appStoreRssUrl,
      fearGreedUrl: settings.fearGreedUrl,
      googleTrendsUrl: settings.googleTrendsUrl,
      timeoutMs: settings.fetchTimeoutMs,
    }),
    email: Object.freeze({
      address: settings.emailAddress,
      password: settings.emailPassword,
      to: settings.emailTo,
      smtpHost: settings.smtpHost,
      smtpPort: settings.smtpPort,
      smtpSecure: settings.smtpSecure,
    }),
    history: Object.freeze({
      filePath: settings.historyFile,
      maxSamples: settings.historyMaxSamples,
    }),
    charts: Object.freeze({
      enabled: settings.chartsEnabled,
      maxPoints: settings.chartMaxPoints,
    }),
    dryRun: settings.dryRun,
  });
}
