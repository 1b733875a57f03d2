export * from './threading';
export * from './errors';
export {
  ThreadingConfig,
  ThreadingConfigOverrides,
  DEFAULT_THREADING_CONFIG,
  getThreadingConfig,
  loadThreadingConfigFromEnv,
} from './config/threading';
