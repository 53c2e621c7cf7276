import axios, { AxiosAdapter, AxiosInstance, Method } from 'axios';
import JSONbig from 'json-bigint';
import { DatabricksConfig } from './databricksConfig';
import { ApiError, CancelledError, NotFoundError } from './errors';
import { logger } from './logger';

export interface RequestOptions {
  query?: Record<string, string>;
  signal?: AbortSignal;
}

/**
 * Minimal REST capability the permissions core needs from a workspace
 */
export interface DatabricksClient {
  get<T>(path: string, options?: RequestOptions): Promise<T>;
  put<T>(path: string, body: unknown, options?: RequestOptions): Promise<T>;
  patch<T>(path: string, body: unknown, options?: RequestOptions): Promise<T>;
  post<T>(path: string, body: unknown, options?: RequestOptions): Promise<T>;
  delete<T>(path: string, options?: RequestOptions): Promise<T>;
}

interface ApiErrorBody {
  error_code?: string;
  message?: string;
}

function isApiErrorBody(data: unknown): data is ApiErrorBody {
  return typeof data === 'object' && data !== null && ('error_code' in data || 'message' in data);
}

// Workspace object ids are int64; integers too long for a double stay strings
const int64Json = JSONbig({ storeAsString: true });

/**
 * Response body parser used in place of axios' JSON.parse
 */
export function parseResponseBody(data: unknown): unknown {
  if (typeof data !== 'string' || data.trim() === '') {
    return data;
  }
  try {
    const parsed: unknown = int64Json.parse(data);
    return parsed;
  } catch (error) {
    logger.debug('Response body is not JSON, keeping it as text', { error: String(error) });
    return data;
  }
}

/**
 * Translate axios failures into the structured API errors callers match on
 */
export function toApiError(error: unknown): unknown {
  if (axios.isCancel(error)) {
    return new CancelledError('request completed');
  }
  if (!axios.isAxiosError(error) || !error.response) {
    return error;
  }

  const { status, statusText, data } = error.response;
  const errorCode = isApiErrorBody(data) && data.error_code ? data.error_code : statusText || 'UNKNOWN';
  const message = isApiErrorBody(data) && data.message ? data.message : error.message;

  if (status === 404) {
    return new NotFoundError(message, errorCode);
  }
  return new ApiError(status, errorCode, message);
}

export function createDatabricksClient(config: DatabricksConfig, adapter?: AxiosAdapter): DatabricksClient {
  const instance: AxiosInstance = axios.create({
    baseURL: `${config.host}/api/${config.apiVersion}`,
    timeout: config.timeoutMs,
    headers: {
      'Content-Type': 'application/json',
      Authorization: `Bearer ${config.token}`,
    },
    transformResponse: [parseResponseBody],
    ...(adapter && { adapter }),
  });

  instance.interceptors.response.use(
    (response) => response,
    (error: unknown) => Promise.reject(toApiError(error)),
  );

  const send = async <T>(method: Method, path: string, body: unknown, options: RequestOptions = {}): Promise<T> => {
    logger.debug(`${method} ${path}`, { query: options.query });
    const response = await instance.request<T>({
      method,
      url: path,
      params: options.query,
      data: body,
      signal: options.signal,
    });
    return response.data;
  };

  return {
    get: <T>(path: string, options?: RequestOptions) => send<T>('GET', path, undefined, options),
    put: <T>(path: string, body: unknown, options?: RequestOptions) => send<T>('PUT', path, body, options),
    patch: <T>(path: string, body: unknown, options?: RequestOptions) => send<T>('PATCH', path, body, options),
    post: <T>(path: string, body: unknown, options?: RequestOptions) => send<T>('POST', path, body, options),
    delete: <T>(path: string, options?: RequestOptions) => send<T>('DELETE', path, undefined, options),
  };
}
