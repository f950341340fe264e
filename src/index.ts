export * from './domain/contracts';
export * from './domain/errors';
export { loadAppConfig, settingsDefaultsFrom } from './config/appConfig';
export type { AppConfig, DataSource } from './config/appConfig';
export { FetchHttpClient } from './providers/httpClient';
export type { HttpClient, FetchLike, BinaryPayload } from './providers/httpClient';
export { HttpDataLoaderService } from './providers/httpDataLoaderService';
export type { HttpDataLoaderServiceConfig } from './providers/httpDataLoaderService';
export { FixtureDataLoaderService } from './providers/fixtureDataLoaderService';
export type { FixtureDataLoaderServiceOptions } from './providers/fixtureDataLoaderService';
export { ConsoleLogger, silentLogger } from './services/logging/logger';
export type { Logger, LogLevel } from './services/logging/logger';
export { IoPool } from './services/pool/ioPool';
export { FileSettingsStore } from './services/settings/fileSettingsStore';
export { NotificationBus } from './services/wizard/notificationBus';
export type { BusEvent, Unsubscribe } from './services/wizard/notificationBus';
export { PipelineStateStore } from './services/wizard/pipelineStateStore';
export { FetchCoordinator } from './services/wizard/fetchCoordinator';
export type { FetchOutcome } from './services/wizard/fetchCoordinator';
export { WizardController } from './services/wizard/wizardController';
export type { WizardControllerConfig } from './services/wizard/wizardController';
export { WizardSessionRegistry } from './services/wizard/wizardSessionRegistry';
export { stageDefinitions } from './services/wizard/stageRegistry';
