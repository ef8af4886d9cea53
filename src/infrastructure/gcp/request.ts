/**
 * Authenticated JSON requests against Google Cloud REST APIs
 */

import type { Logger } from 'pino';
import { z } from 'zod';
import { Failure, Success, type Result } from '../../domain/types/result';
import type { PlatformFailure } from '../../domain/types/interfaces';
import type { TokenProvider } from '../auth/token-provider';

const ApiErrorSchema = z.object({
  error: z.object({ message: z.string().optional(), status: z.string().optional() }),
});

export type GcpRequest = (
  method: string,
  url: string,
  body?: unknown,
) => Promise<Result<unknown, PlatformFailure>>;

export interface GcpRequestOptions {
  requestTimeoutMs: number;
  /** Names the API in debug logs */
  api: string;
}

/**
 * Classify a non-2xx response. 429 and 5xx are worth retrying.
 */
export async function toFailure(response: Response): Promise<PlatformFailure> {
  let message = `${response.status} ${response.statusText}`;
  try {
    const parsed = ApiErrorSchema.safeParse(await response.json());
    if (parsed.success && parsed.data.error.message) {
      message = parsed.data.error.message;
    }
  } catch {
    // body is not JSON; keep the status line
  }

  if (response.status === 404) {
    return { kind: 'not-found', message, status: response.status };
  }
  if (response.status === 409) {
    return { kind: 'conflict', message, status: response.status };
  }
  if (response.status >= 400 && response.status < 500 && response.status !== 429) {
    return { kind: 'rejected', message, status: response.status };
  }
  return { kind: 'unavailable', message, status: response.status };
}

export function createGcpRequest(
  logger: Logger,
  tokenProvider: TokenProvider,
  { requestTimeoutMs, api }: GcpRequestOptions,
): GcpRequest {
  return async (method, url, body) => {
    try {
      const token = await tokenProvider.getAccessToken();
      const response = await fetch(url, {
        method,
        headers: {
          Authorization: `Bearer ${token}`,
          'Content-Type': 'application/json',
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(requestTimeoutMs),
      });

      if (!response.ok) {
        const failure = await toFailure(response);
        logger.debug({ method, url, failure }, `${api} request failed`);
        return Failure(failure);
      }

      const text = await response.text();
      return Success(text === '' ? {} : JSON.parse(text));
    } catch (error) {
      return Failure<unknown, PlatformFailure>({
        kind: 'unavailable',
        message: error instanceof Error ? error.message : String(error),
      });
    }
  };
}
