/**
 * Shared API utilities
 */
export {
  createHttpClient,
  HttpError,
  isNetworkError,
  type HttpClient,
  type HttpClientOptions,
  type RequestOptions,
} from './http-client';
