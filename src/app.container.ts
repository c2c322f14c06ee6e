import { DIContainer } from './shared/container';
import type { MonitorConfig } from './config/monitor.config';
import type { IIndicatorHistoryRepository } from './domain/interfaces/repositories.interface';
import type {
  IChartRenderer,
  IMarketDataGateway,
  INotificationService,
} from './domain/interfaces/services.interface';

import { JsonApiClient } from './infrastructure/http/json-api.client';
import { AppStoreRankingFetcher } from './infrastructure/market-data/fetchers/app-store-ranking.fetcher';
import { CoinGeckoGlobalFetcher } from './infrastructure/market-data/fetchers/coingecko-global.fetcher';
import { FearGreedFetcher } from './infrastructure/market-data/fetchers/fear-greed.fetcher';
import { FredM2Fetcher } from './infrastructure/market-data/fetchers/fred-m2.fetcher';
import { GoogleTrendsFetcher } from './infrastructure/market-data/fetchers/google-trends.fetcher';
import { MarketDataGatewayService } from './infrastructure/market-data/market-data-gateway.service';
import { IndicatorHistoryRepository } from './infrastructure/repositories/indicator-history.repository';
import { ChartRendererService } from './infrastructure/services/chart-renderer.service';
import { EmailNotificationService } from './infrastructure/services/notification.service';
import { createMailTransport, type MailTransport } from './infrastructure/mail/mail.transport';

import { EvaluationCoordinator } from './modules/evaluation';
import { SnapshotRecorder } from './modules/indicator-history/snapshot-recorder';
import { RunMonitorUseCase } from './application/use-cases/run-monitor.use-case';
import { MarketExitMonitor } from './app';

import { Logger } from './shared/logger';

const logger = new Logger('DependencyContainer');

/** Every token the container resolves, with the type it resolves to. */
export interface AppRegistry {
  MonitorConfig: MonitorConfig;
  JsonApiClient: JsonApiClient;
  IMarketDataGateway: IMarketDataGateway;
  IIndicatorHistoryRepository: IIndicatorHistoryRepository;
  SnapshotRecorder: SnapshotRecorder;
  EvaluationCoordinator: EvaluationCoordinator;
  IChartRenderer: IChartRenderer | null;
  MailTransport: MailTransport;
  INotificationService: INotificationService;
  RunMonitorUseCase: RunMonitorUseCase;
  MarketExitMonitor: MarketExitMonitor;
}

export type AppContainer = DIContainer<AppRegistry>;

export function registerDependencies(config: MonitorConfig): AppContainer {
  const container = new DIContainer<AppRegistry>();

  container.bind('MonitorConfig', () => config);

  // --- Register Market Data ---
  container.bind('JsonApiClient', () => new JsonApiClient(config.endpoints.timeoutMs));
  container.bind('IMarketDataGateway', () => {
    const client = container.get('JsonApiClient');
    const { endpoints } = config;
    return new MarketDataGatewayService({
      global: new CoinGeckoGlobalFetcher(client, endpoints.coinGeckoGlobalUrl),
      m2: new FredM2Fetcher(client, endpoints.fredObservationsUrl, endpoints.fredApiKey, endpoints.fredSeriesId),
      fearGreed: new FearGreedFetcher(client, endpoints.fearGreedUrl),
      trends: new GoogleTrendsFetcher(client, endpoints.googleTrendsUrl),
      apps: new AppStoreRankingFetcher(client, endpoints.appStoreRssUrl),
    });
  });

  // --- Register History ---
  container.bind(
    'IIndicatorHistoryRepository',
    () => new IndicatorHistoryRepository(config.history.filePath, config.history.maxSamples),
  );
  container.bind('SnapshotRecorder', () => new SnapshotRecorder(config.thresholds.socialTerms));

  // --- Register Evaluation ---
  container.bind('EvaluationCoordinator', () => new EvaluationCoordinator());

  // --- Register Charts & Notification ---
  container.bind('IChartRenderer', () =>
    config.charts.enabled ? new ChartRendererService(config.charts.maxPoints) : null,
  );
  container.bind('MailTransport', () => createMailTransport(config.email));
  container.bind(
    'INotificationService',
    () => new EmailNotificationService(container.get('MailTransport'), config.email, config.dryRun),
  );

  // --- Register Main App ---
  container.bind(
    'RunMonitorUseCase',
    () =>
      new RunMonitorUseCase({
        gateway: container.get('IMarketDataGateway'),
        repository: container.get('IIndicatorHistoryRepository'),
        recorder: container.get('SnapshotRecorder'),
        coordinator: container.get('EvaluationCoordinator'),
        chartRenderer: container.get('IChartRenderer'),
        notifier: container.get('INotificationService'),
        thresholds: config.thresholds,
      }),
  );
  container.bind('MarketExitMonitor', () => new MarketExitMonitor(container.get('RunMonitorUseCase')));

  if (!config.charts.enabled) logger.info('Charts disabled, alerts will carry text only');
  if (config.dryRun) logger.info('📭 DRY_RUN enabled, alerts will be logged instead of emailed');

  return container;
}
