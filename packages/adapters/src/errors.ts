export {
  ConfigError,
  ProviderError,
  RateLimitError,
  TimeoutError,
} from '@leansmith/shared';
