import { describe, it, expect, beforeEach } from '@jest/globals';
import { createMlflowClient } from '../../../src/infrastructure/mlflow/client';
import {
  IS_PROMPT_TAG,
  MlflowTemplateStore,
  PROMPT_TEXT_TAG,
} from '../../../src/infrastructure/mlflow/prompt-registry';
import { BackendUnavailableError, NotFoundError } from '../../../src/lib/errors';
import { API, FakeMlflow } from '../../__support__/mlflow-fake';
import { silentLogger } from '../../__support__/fakes';

describe('MlflowTemplateStore', () => {
  let server: FakeMlflow;
  let store: MlflowTemplateStore;

  beforeEach(() => {
    server = new FakeMlflow();
    const logger = silentLogger();
    store = new MlflowTemplateStore(
      createMlflowClient({ baseUrl: 'http://mlflow.test', timeoutMs: 1000, fetch: server.fetch }, logger),
      logger,
    );
  });

  describe('load', () => {
    it('should read the prompt body from the version tags', async () => {
      server.on('GET', `${API}/registered-models/alias`, {
        json: {
          model_version: {
            name: 'mentor_simulation',
            version: '4',
            tags: [
              { key: PROMPT_TEXT_TAG, value: 'Hi {name}' },
              { key: IS_PROMPT_TAG, value: 'true' },
              { key: 'llm', value: 'gemini-1.5-flash' },
            ],
          },
        },
      });

      const result = await store.load('mentor_simulation');

      expect(result).toEqual({
        ok: true,
        value: {
          name: 'mentor_simulation',
          version: 4,
          alias: 'production',
          body: 'Hi {name}',
          tags: { llm: 'gemini-1.5-flash' },
        },
      });
      expect(server.requests[0]?.query).toEqual({ name: 'mentor_simulation', alias: 'production' });
    });

    it('should report NotFoundError for an unbound alias', async () => {
      server.on('GET', `${API}/registered-models/alias`, {
        status: 404,
        json: { error_code: 'RESOURCE_DOES_NOT_EXIST', message: 'no alias' },
      });

      const result = await store.load('mentor_simulation');
      expect(!result.ok && result.error).toBeInstanceOf(NotFoundError);
    });

    it('should report NotFoundError for a version without prompt text', async () => {
      server.on('GET', `${API}/registered-models/alias`, {
        json: { model_version: { name: 'model', version: '1', tags: [] } },
      });

      const result = await store.load('model');
      expect(!result.ok && result.error).toBeInstanceOf(NotFoundError);
    });

    it('should report BackendUnavailableError when the server is unreachable', async () => {
      server.on('GET', `${API}/registered-models/alias`, new TypeError('fetch failed'));

      const result = await store.load('mentor_simulation');
      expect(!result.ok && result.error).toBeInstanceOf(BackendUnavailableError);
    });

    it('should report BackendUnavailableError for unexpected rejections', async () => {
      server.on('GET', `${API}/registered-models/alias`, {
        status: 403,
        json: { error_code: 'PERMISSION_DENIED', message: 'denied' },
      });

      const result = await store.load('mentor_simulation');
      expect(!result.ok && result.error).toBeInstanceOf(BackendUnavailableError);
    });
  });

  describe('register', () => {
    beforeEach(() => {
      server.on('POST', `${API}/model-versions/create`, (request) => ({
        json: { model_version: { name: 'p', version: '2', tags: [] }, echo: request.body },
      }));
    });

    it('should create the prompt entry and a tagged version', async () => {
      server.on('POST', `${API}/registered-models/create`, { json: { registered_model: { name: 'p' } } });

      const template = await store.register('p', 'Body {x}', 'gemini-1.5-flash');

      expect(template).toEqual({
        name: 'p',
        version: 2,
        body: 'Body {x}',
        tags: {
          author: 'AI Career Companion',
          task: 'Content Generation',
          language: 'en',
          llm: 'gemini-1.5-flash',
          platform: 'gcp',
          vertex_ai_model: 'gemini-1.5-flash',
        },
      });
      const [create] = server.requestsTo('POST', `${API}/model-versions/create`);
      expect(create?.body).toMatchObject({
        name: 'p',
        description: 'Prompt Registration - GCP Deployment',
        tags: expect.arrayContaining([
          { key: PROMPT_TEXT_TAG, value: 'Body {x}' },
          { key: IS_PROMPT_TAG, value: 'true' },
        ]),
      });
    });

    it('should tolerate an existing prompt entry', async () => {
      server.on('POST', `${API}/registered-models/create`, {
        status: 400,
        json: { error_code: 'RESOURCE_ALREADY_EXISTS', message: 'exists' },
      });

      const template = await store.register('p', 'Body', 'm');
      expect(template.version).toBe(2);
    });

    it('should never bind an alias', async () => {
      server.on('POST', `${API}/registered-models/create`, { json: {} });

      await store.register('p', 'Body', 'm');
      expect(server.requestsTo('POST', `${API}/registered-models/alias`)).toHaveLength(0);
    });

    it('should reject with BackendUnavailableError when the server is unreachable', async () => {
      server.on('POST', `${API}/registered-models/create`, new TypeError('fetch failed'));

      await expect(store.register('p', 'Body', 'm')).rejects.toBeInstanceOf(BackendUnavailableError);
    });
  });

  describe('promote', () => {
    it('should set the alias to the given version', async () => {
      server.on('POST', `${API}/registered-models/alias`, { json: {} });

      await store.promote('p', 7, 'staging');

      expect(server.requests[0]?.body).toEqual({ name: 'p', alias: 'staging', version: '7' });
    });
  });

  describe('list', () => {
    it('should follow pagination and summarise each prompt', async () => {
      server.on('GET', `${API}/registered-models/search`, (request) =>
        request.query.page_token === 'next'
          ? { json: { registered_models: [{ name: 'b' }] } }
          : {
              json: {
                registered_models: [
                  {
                    name: 'a',
                    tags: [{ key: IS_PROMPT_TAG, value: 'true' }, { key: 'team', value: 'x' }],
                    aliases: [{ alias: 'production', version: '2' }],
                    latest_versions: [
                      { name: 'a', version: '1' },
                      { name: 'a', version: '3' },
                    ],
                  },
                ],
                next_page_token: 'next',
              },
            },
      );

      expect(await store.list()).toEqual([
        { name: 'a', latestVersion: 3, aliases: { production: 2 }, tags: { team: 'x' } },
        { name: 'b', latestVersion: undefined, aliases: {}, tags: {} },
      ]);
      expect(server.requests[0]?.query.filter).toBe("tags.`mlflow.prompt.is_prompt` = 'true'");
    });
  });
});
