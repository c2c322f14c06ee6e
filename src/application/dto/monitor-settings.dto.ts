import {
  ArrayNotEmpty,
  IsBoolean,
  IsEmail,
  IsInt,
  IsNumber,
  IsPositive,
  IsString,
  IsUrl,
  Max,
  Min,
  MinLength,
  ValidateIf,
} from 'class-validator';

const URL_OPTIONS = { require_tld: false, require_protocol: true, protocols: ['http', 'https'] };

export class MonitorSettingsDto {
  @ValidateIf((o: MonitorSettingsDto) => o.emailAddress !== '')
  @IsEmail({}, { message: 'EMAIL_ADDRESS must be an email address' })
  emailAddress!: string;

  @IsString()
  emailPassword!: string;

  @ValidateIf((o: MonitorSettingsDto) => o.emailTo !== '')
  @IsEmail({}, { message: 'EMAIL_TO must be an email address' })
  emailTo!: string;

  @IsString()
  @MinLength(1, { message: 'SMTP_HOST must not be empty' })
  smtpHost!: string;

  @IsInt({ message: 'SMTP_PORT must be an integer' })
  @Min(1)
  @Max(65535)
  smtpPort!: number;

  @IsBoolean()
  smtpSecure!: boolean;

  @IsString()
  fredApiKey!: string;

  @IsString()
  @MinLength(1, { message: 'FRED_SERIES_ID must not be empty' })
  fredSeriesId!: string;

  @IsNumber({}, { message: 'BTC_DOM_THRESHOLD must be a number' })
  @Min(0, { message: 'BTC_DOM_THRESHOLD must be between 0 and 100' })
  @Max(100, { message: 'BTC_DOM_THRESHOLD must be between 0 and 100' })
  btcDominanceFloor!: number;

  @IsNumber({}, { message: 'M2_FLAT_THRESHOLD must be a number' })
  @IsPositive({ message: 'M2_FLAT_THRESHOLD must be positive' })
  m2FlatEpsilon!: number;

  @IsInt({ message: 'M2_FLAT_WINDOW must be an integer' })
  @Min(2, { message: 'M2_FLAT_WINDOW must cover at least 2 observations' })
  m2FlatWindow!: number;

  @IsNumber({}, { message: 'ALT_PULLBACK must be a number' })
  @IsPositive({ message: 'ALT_PULLBACK must be in (0, 1]' })
  @Max(1, { message: 'ALT_PULLBACK must be in (0, 1]' })
  altPullbackRatio!: number;

  @IsNumber({}, { message: 'ALT_PULLBACK_WINDOW_DAYS must be a number' })
  @IsPositive({ message: 'ALT_PULLBACK_WINDOW_DAYS must be positive' })
  altPullbackWindowDays!: number;

  @IsInt({ message: 'TRENDS_HITS_REQ must be an integer' })
  @Min(1, { message: 'TRENDS_HITS_REQ must be at least 1' })
  trendHitsRequired!: number;

  @ArrayNotEmpty({ message: 'SOCIAL_TERMS must list at least one term' })
  @IsString({ each: true })
  @MinLength(1, { each: true })
  socialTerms!: string[];

  @IsUrl(URL_OPTIONS, { message: 'COINGECKO_GLOBAL_API must be an http(s) URL' })
  coinGeckoGlobalUrl!: string;

  @IsUrl(URL_OPTIONS, { message: 'FRED_API must be an http(s) URL' })
  fredObservationsUrl!: string;

  @IsUrl(URL_OPTIONS, { message: 'APP_STORE_RSS must be an http(s) URL' })
  appStoreRssUrl!: string;

  @IsUrl(URL_OPTIONS, { message: 'FEAR_GREED_API must be an http(s) URL' })
  fearGreedUrl!: string;

  @IsUrl(URL_OPTIONS, { message: 'GOOGLE_TRENDS_API must be an http(s) URL' })
  googleTrendsUrl!: string;

  @IsString()
  @MinLength(1, { message: 'HISTORY_FILE must not be empty' })
  historyFile!: string;

  @IsInt({ message: 'HISTORY_MAX_SAMPLES must be an integer' })
  @Min(2, { message: 'HISTORY_MAX_SAMPLES must be at least 2' })
  historyMaxSamples!: number;

  @IsInt({ message: 'FETCH_TIMEOUT_MS must be an integer' })
  @Min(100, { message: 'FETCH_TIMEOUT_MS must be at least 100' })
  fetchTimeoutMs!: number;

  @IsBoolean()
  chartsEnabled!: boolean;

  @IsInt({ message: 'CHART_MAX_POINTS must be an integer' })
  @Min(2, { message: 'CHART_MAX_POINTS must be at least 2' })
  chartMaxPoints!: number;

  @IsBoolean()
  dryRun!: boolean;
}
