import axios, { type AxiosInstance, type AxiosRequestConfig, type AxiosResponse } from "axios";
import type { Logger } from "pino";
import { ExternalServiceError } from "../errors";

export interface RetryPolicy {
  retryCount: number;
  retryBackoffMs: number;
}

export interface HttpClientOptions {
  timeoutMs: number;
  userAgent: string;
}

export function createHttpClient(options: HttpClientOptions): AxiosInstance {
  const http = axios.create();
  http.defaults.timeout = options.timeoutMs;
  http.defaults.headers.common["User-Agent"] = options.userAgent;
  return http;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function isRetryableError(error: unknown): boolean {
  if (!axios.isAxiosError(error)) {
    return false;
  }

  const status = error.response?.status;
  if (status === undefined) {
    return true;
  }

  if (status === 429) {
    return true;
  }

  return status >= 500;
}

export function describeHttpError(error: unknown): string {
  if (!axios.isAxiosError(error)) {
    return error instanceof Error ? error.message : String(error);
  }

  const status = error.response?.status;
  const body = error.response?.data;
  const detail = typeof body === "string" ? body : body ? JSON.stringify(body) : "";
  return [status ? `HTTP ${status}` : error.code ?? "network error", error.message, detail.slice(0, 300)]
    .filter((part) => part.length > 0)
    .join(": ");
}

export interface RetryRequestArgs {
  http: AxiosInstance;
  request: AxiosRequestConfig;
  policy: RetryPolicy;
  logger: Logger;
  service: ExternalServiceError["service"];
  wait?: (ms: number) => Promise<void>;
}

export async function requestWithRetry<T>(args: RetryRequestArgs): Promise<T> {
  const response = await requestResponseWithRetry<T>(args);
  return response.data;
}

/** Failures surface as ExternalServiceError once retries are exhausted or not allowed. */
export async function requestResponseWithRetry<T>(args: RetryRequestArgs): Promise<AxiosResponse<T>> {
  const wait = args.wait ?? sleep;
  let attempt = 0;

  while (true) {
    try {
      return await args.http.request<T>(args.request);
    } catch (error) {
      if (!isRetryableError(error) || attempt >= args.policy.retryCount) {
        const status = axios.isAxiosError(error) ? error.response?.status ?? null : null;
        throw new ExternalServiceError(args.service, describeHttpError(error), status, {
          cause: error,
        });
      }

      const base = args.policy.retryBackoffMs * 2 ** attempt;
      const jitter = Math.floor(Math.random() * args.policy.retryBackoffMs);
      const delayMs = base + jitter;

      args.logger.warn(
        {
          err: axios.isAxiosError(error)
            ? {
                message: error.message,
                code: error.code,
                status: error.response?.status,
                url: args.request.url,
              }
            : error,
          service: args.service,
          attempt,
          delayMs,
        },
        "Retrying external request",
      );

      await wait(delayMs);
      attempt += 1;
    }
  }
}
