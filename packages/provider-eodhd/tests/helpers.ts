/**
 * In-process HTTP stand-in and quiet logger for provider tests.
 */

import axios, { AxiosError } from 'axios';
import type { AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import winston from 'winston';
import { createLogger } from '@refdata/logger';
import type { Logger } from '@refdata/logger';

export interface StubRoute {
  status?: number;
  data?: unknown;
  failure?: 'timeout' | 'network';
}

export interface StubHttp {
  http: AxiosInstance;
  requests: InternalAxiosRequestConfig[];
}

/**
 * axios instance whose adapter answers from a path → route table.
 * Unknown paths answer 404.
 */
export function stubHttp(routes: Record<string, StubRoute>): StubHttp {
  const requests: InternalAxiosRequestConfig[] = [];

  const http = axios.create({
    adapter: async (config) => {
      requests.push(config);
      const route: StubRoute = (config.url !== undefined ? routes[config.url] : undefined) ?? { status: 404, data: {} };

      if (route.failure === 'timeout') {
        throw new AxiosError('timeout of 30000ms exceeded', AxiosError.ECONNABORTED, config);
      }
      if (route.failure === 'network') {
        throw new AxiosError('connect ECONNREFUSED 127.0.0.1:443', AxiosError.ERR_NETWORK, config);
      }

      const status = route.status ?? 200;
      const response: AxiosResponse = {
        data: route.data,
        status,
        statusText: status < 400 ? 'OK' : 'Error',
        headers: {},
        config,
      };

      if (status >= 400) {
        throw new AxiosError(
          `Request failed with status code ${status}`,
          AxiosError.ERR_BAD_RESPONSE,
          config,
          null,
          response
        );
      }
      return response;
    },
  });

  return { http, requests };
}

/**
 * Logger that accepts every level and writes nowhere.
 */
export function quietLogger(): Logger {
  const logger = createLogger({ level: 'debug', console: false });
  logger.add(new winston.transports.Console({ silent: true }));
  return logger;
}

/**
 * Clock returning the given instants in order, then the last one forever.
 */
export function sequenceClock(...instants: string[]): () => Date {
  let index = 0;
  return () => {
    const instant = instants[Math.min(index, instants.length - 1)] ?? '1970-01-01T00:00:00.000Z';
    index += 1;
    return new Date(instant);
  };
}
