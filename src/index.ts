export { CatalogConfig, loadConfig } from './config/catalog';
export { DEFAULT_SENSOR_CATALOG_PATH, loadSensorCatalog } from './config/sensors';
export { ExtractOptions, extractFolder } from './functions/extractFolder';
export { createViewerApp, ViewerOptions } from './functions/viewer';
export { createDefaultRegistry, ParserRegistry } from './parsers/registry';
export { DeviceParser, SensorMatch, TabularReader } from './parsers/types';
export {
  CatalogStore,
  CatalogStoreOptions,
  DatabaseStats,
  SensorData,
  SensorListing,
  SensorSummary,
} from './store/catalogStore';
export * from './types';
export { ExtractionError, FileParseError, QueryRejectedError } from './utils/errors';
export { logger, LogLevel } from './utils/logger';
export { metrics } from './utils/metrics';
