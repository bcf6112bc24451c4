export * from './types';
export {
  DefaultErrorClassifier,
  HttpClient,
  NetworkError,
  TimeoutError,
  getHeader,
  isRetryableCategory,
  statusToCategory,
} from './HttpClient';
export { ConsoleLogger, createDefaultHttpClient } from './factories';
export * from './interceptors';
export * from './locations';
export * from './retryPolicies';
export * from './transport/fetchTransport';
