import type { FetchLike } from '../../src/infrastructure/mlflow/client';

export interface RecordedRequest {
  method: string;
  path: string;
  query: Record<string, string>;
  body: unknown;
}

export type FakeReply = { status?: number; json?: unknown; text?: string } | Error;

type Route = (request: RecordedRequest) => FakeReply;

/**
 * In-process stand-in for the tracking server: routes by "METHOD path"
 * and records every request it sees
 */
export class FakeMlflow {
  readonly requests: RecordedRequest[] = [];
  private readonly routes = new Map<string, Route>();

  on(method: string, path: string, route: Route | FakeReply): this {
    this.routes.set(`${method} ${path}`, typeof route === 'function' ? route : () => route);
    return this;
  }

  requestsTo(method: string, path: string): RecordedRequest[] {
    return this.requests.filter((request) => request.method === method && request.path === path);
  }

  readonly fetch: FetchLike = async (input, init) => {
    const url = new URL(input);
    const method = init?.method ?? 'GET';
    const rawBody = typeof init?.body === 'string' ? init.body : undefined;
    let body: unknown = rawBody;
    if (rawBody !== undefined && method === 'POST') {
      body = JSON.parse(rawBody);
    }
    const request: RecordedRequest = {
      method,
      path: url.pathname,
      query: Object.fromEntries(url.searchParams),
      body,
    };
    this.requests.push(request);

    const route = this.routes.get(`${method} ${url.pathname}`);
    const reply: FakeReply = route ? route(request) : { status: 404, json: { error_code: 'ENDPOINT_NOT_FOUND' } };
    if (reply instanceof Error) {
      throw reply;
    }
    const text = reply.text ?? (reply.json === undefined ? '' : JSON.stringify(reply.json));
    return new Response(text, { status: reply.status ?? 200 });
  };
}

export const API = '/api/2.0/mlflow';
