export * from './reader/renderer';
export { loadViewerConfig, defaultViewerConfig, IMAGE_QUALITY_PRESETS } from './config/viewer-config';
export type {
  ImageQuality,
  TextConfig,
  TextDisplayMode,
  ViewerConfig,
  ViewerConfigInput,
  ZoomConfig,
} from './config/viewer-config';
export { createLogger, componentLogger, getLogger, setLogger } from './logging/logger';
export type { Logger } from './logging/logger';
