import { AxiosError, AxiosHeaders, type AxiosAdapter, type InternalAxiosRequestConfig } from 'axios';

export interface RecordedRequest {
  method: string;
  url: string;
  params: unknown;
  data: unknown;
  headers: Record<string, unknown>;
}

export interface FakeResponse {
  status: number;
  data: unknown;
  headers?: Record<string, string>;
}

type Handler = (request: RecordedRequest) => FakeResponse;

function parseBody(data: unknown): unknown {
  if (typeof data !== 'string') {
    return data;
  }
  try {
    return JSON.parse(data);
  } catch {
    return data;
  }
}

/**
 * In-process stand-in for the HTTP layer: every request is recorded and
 * answered by `handler`; non-2xx answers reject the way axios does.
 */
export function fakeAdapter(handler: Handler): { adapter: AxiosAdapter; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];

  const adapter: AxiosAdapter = async (config: InternalAxiosRequestConfig) => {
    const request: RecordedRequest = {
      method: (config.method ?? 'get').toUpperCase(),
      url: `${config.baseURL ?? ''}${config.url ?? ''}`,
      params: config.params,
      data: parseBody(config.data),
      headers: config.headers.toJSON(),
    };
    requests.push(request);

    const answer = handler(request);
    const response = {
      data: answer.data,
      status: answer.status,
      statusText: String(answer.status),
      headers: new AxiosHeaders(answer.headers ?? {}),
      config,
    };

    if (answer.status >= 200 && answer.status < 300) {
      return response;
    }
    throw new AxiosError(`Request failed with status code ${answer.status}`, 'ERR_BAD_RESPONSE', config, null, response);
  };

  return { adapter, requests };
}
