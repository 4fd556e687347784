import axios, { type AxiosAdapter, type AxiosInstance, type InternalAxiosRequestConfig } from 'axios';
import { createLogger } from '@relayhook/shared';
import { resolveHttpClientConfig, type ClientOptions } from './config.js';
import { HttpClient } from './http-client.js';

export interface RecordedRequest {
  method: string | undefined;
  baseURL: string | undefined;
  url: string | undefined;
  headers: Record<string, string>;
  data: unknown;
}

export interface FakeReply {
  status: number;
  data?: unknown;
  headers?: Record<string, string>;
  statusText?: string;
}

export type FakeStep = FakeReply | Error | ((config: InternalAxiosRequestConfig) => FakeReply);

export interface FakeAxios {
  instance: AxiosInstance;
  requests: RecordedRequest[];
}

function record(config: InternalAxiosRequestConfig): RecordedRequest {
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(config.headers.toJSON())) {
    if (value !== undefined && value !== null) {
      headers[name.toLowerCase()] = String(value);
    }
  }
  return {
    method: config.method?.toUpperCase(),
    baseURL: config.baseURL,
    url: config.url,
    headers,
    data: config.data,
  };
}

/**
 * axios instance whose adapter replays the given steps in order.
 */
export function createFakeAxios(steps: FakeStep[]): FakeAxios {
  const requests: RecordedRequest[] = [];
  const adapter: AxiosAdapter = async (config) => {
    requests.push(record(config));
    const step = steps.shift();
    if (step === undefined) {
      throw new Error(`No fake response left for ${config.url}`);
    }
    if (step instanceof Error) {
      throw step;
    }
    const reply = typeof step === 'function' ? step(config) : step;
    return {
      data: reply.data,
      status: reply.status,
      statusText: reply.statusText ?? '',
      headers: reply.headers ?? {},
      config,
    };
  };
  return { instance: axios.create({ adapter }), requests };
}

export const silentLogger = createLogger({ name: 'test', level: 'silent' });

export const TEST_TOKEN = 'testsk_placeholder';

export function createTestHttpClient(fake: FakeAxios, options: ClientOptions = {}): HttpClient {
  return new HttpClient(resolveHttpClientConfig(TEST_TOKEN, {
    serverUrl: 'https://api.example.test',
    retryScheduleMs: [0],
    logger: silentLogger,
    axiosInstance: fake.instance,
    ...options,
  }));
}
