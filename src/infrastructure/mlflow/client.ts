/**
 * MLflow REST client
 *
 * Minimal JSON client over the MLflow tracking server API. Every call is
 * bounded by the configured timeout; failures are mapped onto the service's
 * error classes so the registry and tracking layers never see raw fetch errors.
 */

import type { Logger } from 'pino';
import type { z } from 'zod';
import {
  BackendUnavailableError,
  CareerCompanionError,
  ErrorCodes,
  NotFoundError,
  errorMessage,
  toError,
} from '../../lib/errors';
import { ErrorResponseSchema } from './schemas';

const API_PREFIX = '/api/2.0/mlflow';
const ARTIFACTS_PREFIX = '/api/2.0/mlflow-artifacts/artifacts';

/**
 * The tracking server answered but refused the request
 */
export class MlflowRequestError extends CareerCompanionError {
  constructor(
    message: string,
    public readonly status: number,
    public readonly errorCode: string | undefined,
  ) {
    super(message, ErrorCodes.INTERNAL_ERROR, { status, errorCode });
    this.name = 'MlflowRequestError';
  }
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface MlflowClientOptions {
  /** Tracking server URL, or a lazy lookup of it */
  baseUrl: string | (() => Promise<string>);
  timeoutMs: number;
  fetch?: FetchLike;
}

export type QueryParams = Record<string, string | number | undefined>;

export interface MlflowClient {
  get<S extends z.ZodTypeAny>(path: string, query: QueryParams, schema: S): Promise<z.output<S>>;
  post<S extends z.ZodTypeAny>(path: string, body: unknown, schema: S): Promise<z.output<S>>;
  uploadArtifact(artifactPath: string, content: string): Promise<void>;
}

/**
 * Create an MLflow client
 */
export const createMlflowClient = (options: MlflowClientOptions, logger: Logger): MlflowClient => {
  const fetchImpl: FetchLike = options.fetch ?? ((input, init) => fetch(input, init));
  const log = logger.child({ component: 'MlflowClient' });

  const resolveBaseUrl = async (): Promise<string> => {
    const base = typeof options.baseUrl === 'string' ? options.baseUrl : await options.baseUrl();
    return base.replace(/\/+$/, '');
  };

  const send = async (url: string, init: RequestInit, operation: string): Promise<Response> => {
    try {
      return await fetchImpl(url, { ...init, signal: AbortSignal.timeout(options.timeoutMs) });
    } catch (error) {
      log.warn({ operation, error: errorMessage(error) }, 'MLflow request failed');
      throw new BackendUnavailableError(
        `Tracking server unreachable during ${operation}`,
        { operation },
        toError(error),
      );
    }
  };

  const readJson = async (response: Response, operation: string): Promise<unknown> => {
    const text = await response.text();
    if (!text) return {};
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new BackendUnavailableError(
        `Tracking server returned malformed JSON during ${operation}`,
        { operation, status: response.status },
        toError(error),
      );
    }
  };

  const failureFor = async (response: Response, operation: string): Promise<Error> => {
    const parsed = ErrorResponseSchema.safeParse(await readJson(response, operation).catch(() => ({})));
    const errorCode = parsed.success ? parsed.data.error_code : undefined;
    const message = (parsed.success ? parsed.data.message : undefined) ?? response.statusText;

    if (response.status === 404 || errorCode === 'RESOURCE_DOES_NOT_EXIST') {
      return new NotFoundError(message || `${operation}: not found`, { operation, errorCode });
    }
    if (response.status >= 500 || response.status === 429) {
      return new BackendUnavailableError(`Tracking server error during ${operation}`, {
        operation,
        status: response.status,
      });
    }
    return new MlflowRequestError(`${operation} rejected: ${message}`, response.status, errorCode);
  };

  const handle = async <S extends z.ZodTypeAny>(
    response: Response,
    operation: string,
    schema: S,
  ): Promise<z.output<S>> => {
    if (!response.ok) {
      throw await failureFor(response, operation);
    }
    const parsed = schema.safeParse(await readJson(response, operation));
    if (!parsed.success) {
      throw new BackendUnavailableError(`Unexpected response shape from ${operation}`, {
        operation,
        issues: parsed.error.issues.map((issue) => issue.message),
      });
    }
    return parsed.data;
  };

  return {
    async get(path, query, schema) {
      const url = new URL(`${await resolveBaseUrl()}${API_PREFIX}${path}`);
      for (const [key, value] of Object.entries(query)) {
        if (value !== undefined) {
          url.searchParams.set(key, String(value));
        }
      }
      log.debug({ path }, 'MLflow GET');
      const response = await send(url.toString(), { method: 'GET' }, path);
      return handle(response, path, schema);
    },

    async post(path, body, schema) {
      log.debug({ path }, 'MLflow POST');
      const response = await send(
        `${await resolveBaseUrl()}${API_PREFIX}${path}`,
        {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify(body),
        },
        path,
      );
      return handle(response, path, schema);
    },

    async uploadArtifact(artifactPath, content) {
      const encodedPath = artifactPath.split('/').map(encodeURIComponent).join('/');
      const response = await send(
        `${await resolveBaseUrl()}${ARTIFACTS_PREFIX}/${encodedPath}`,
        {
          method: 'PUT',
          headers: { 'Content-Type': 'text/plain; charset=utf-8' },
          body: content,
        },
        'upload-artifact',
      );
      if (!response.ok) {
        throw await failureFor(response, 'upload-artifact');
      }
    },
  };
};
