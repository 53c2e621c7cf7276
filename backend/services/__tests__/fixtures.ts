import { AxiosAdapter, AxiosError, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { createDatabricksClient, DatabricksClient } from '../../utils/databricksClient';
import { DatabricksConfig } from '../../utils/databricksConfig';

export type FixtureMethod = 'GET' | 'PUT' | 'PATCH' | 'POST' | 'DELETE';

export interface HttpFixture {
  method: FixtureMethod;
  /** Path below /api/2.0, with the query string if any */
  resource: string;
  status?: number;
  response?: unknown;
  /** Raw JSON text sent instead of `response`, for values JSON.stringify cannot express */
  rawBody?: string;
  reuse?: boolean;
}

export interface RecordedRequest {
  method: string;
  resource: string;
  body?: unknown;
}

export const TEST_CONFIG: DatabricksConfig = {
  host: 'https://workspace.test',
  token: 'test-token',
  apiVersion: '2.0',
  timeoutMs: 1000,
};

export const TESTING_USER = 'ben';
export const TESTING_ADMIN_USER = 'admin';

export const me: HttpFixture = {
  method: 'GET',
  resource: '/preview/scim/v2/Me',
  response: { userName: TESTING_ADMIN_USER },
  reuse: true,
};

const STATUS_TEXT: Record<number, string> = {
  200: 'OK',
  400: 'Bad Request',
  404: 'Not Found',
  500: 'Internal Server Error',
};

function resourceOf(config: InternalAxiosRequestConfig): string {
  const query = config.params ? new URLSearchParams(config.params).toString() : '';
  const url = config.url ?? '';
  return query ? `${url}?${query}` : url;
}

/**
 * In-process axios adapter replaying canned workspace responses. Fixtures
 * are consumed once unless marked `reuse`.
 */
export function fixtureAdapter(fixtures: HttpFixture[], requests: RecordedRequest[]): AxiosAdapter {
  const pending = [...fixtures];

  return async (config) => {
    const method = (config.method ?? 'get').toUpperCase();
    const resource = resourceOf(config);
    const body: unknown = typeof config.data === 'string' ? JSON.parse(config.data) : undefined;
    requests.push(body === undefined ? { method, resource } : { method, resource, body });

    const index = pending.findIndex(fixture => fixture.method === method && fixture.resource === resource);
    if (index < 0) {
      throw new Error(`No fixture for ${method} ${resource}`);
    }
    const fixture = pending[index];
    if (!fixture.reuse) {
      pending.splice(index, 1);
    }

    const status = fixture.status ?? 200;
    const response: AxiosResponse = {
      data: fixture.rawBody ?? JSON.stringify(fixture.response ?? {}),
      status,
      statusText: STATUS_TEXT[status] ?? '',
      headers: {},
      config,
    };
    if (status >= 400) {
      throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_REQUEST, config, undefined, response);
    }
    return response;
  };
}

export function fixtureClient(fixtures: HttpFixture[]): { client: DatabricksClient; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const client = createDatabricksClient(TEST_CONFIG, fixtureAdapter(fixtures, requests));
  return { client, requests };
}
