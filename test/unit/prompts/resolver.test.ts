import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { PromptResolver } from '../../../src/prompts/resolver';
import { PromptUnavailableError } from '../../../src/lib/errors';
import { FlakyTemplateStore, createPromptDir, silentLogger } from '../../__support__/fakes';

const SKILL_GAP = 'Skills: {current_skills}. Target: {target_role}.';
const FIELDS = { current_skills: 'SQL', target_role: 'ML Engineer' };

describe('PromptResolver', () => {
  let store: FlakyTemplateStore;
  let dir: string;
  let cleanup: () => Promise<void>;

  const resolverWith = (autoPromote = true) =>
    new PromptResolver(store, silentLogger(), {
      promptsDir: dir,
      modelTag: 'gemini-1.5-flash',
      autoPromote,
    });

  beforeEach(async () => {
    store = new FlakyTemplateStore();
    ({ dir, cleanup } = await createPromptDir({ 'skill_gap_prompt.txt': SKILL_GAP }));
  });

  afterEach(async () => {
    await cleanup();
  });

  describe('registry hit', () => {
    it('should return the registered version without reading the file', async () => {
      await store.inner.register('skill_gap_analysis', 'From registry: {target_role}', 'm');
      await store.inner.promote('skill_gap_analysis', 1);

      const template = await resolverWith().resolve('skill_gap_analysis', 'does-not-exist.txt');

      expect(template.source).toBe('registry');
      expect(template.version).toBe(1);
      expect(template.render(FIELDS)).toBe('From registry: ML Engineer');
      expect(store.calls).toEqual(['load:skill_gap_analysis@production']);
    });
  });

  describe('registry miss with a readable file', () => {
    it('should register, promote and serve the file content from the registry', async () => {
      const template = await resolverWith().resolve('skill_gap_analysis', 'skill_gap_prompt.txt');

      expect(template.source).toBe('registry');
      expect(template.version).toBe(1);
      expect(template.render(FIELDS)).toBe('Skills: SQL. Target: ML Engineer.');
      expect(store.inner.versionCount('skill_gap_analysis')).toBe(1);
      expect(store.calls).toEqual([
        'load:skill_gap_analysis@production',
        'register:skill_gap_analysis',
        'promote:skill_gap_analysis:1@production',
        'load:skill_gap_analysis@production',
      ]);
    });

    it('should promote the newly created version rather than version 1', async () => {
      await store.inner.register('skill_gap_analysis', 'old', 'm');
      await store.inner.register('skill_gap_analysis', 'older', 'm');

      const template = await resolverWith().resolve('skill_gap_analysis', 'skill_gap_prompt.txt');

      expect(template.version).toBe(3);
      expect(store.calls).toContain('promote:skill_gap_analysis:3@production');
    });

    it('should bind the requested alias', async () => {
      await resolverWith().resolve('skill_gap_analysis', 'skill_gap_prompt.txt', 'staging');

      expect(store.calls).toContain('promote:skill_gap_analysis:1@staging');
      const production = await store.inner.load('skill_gap_analysis', 'production');
      expect(production.ok).toBe(false);
    });

    it('should hit the registry on the next resolve without registering again', async () => {
      const resolver = resolverWith();
      await resolver.resolve('skill_gap_analysis', 'skill_gap_prompt.txt');
      const second = await resolver.resolve('skill_gap_analysis', 'skill_gap_prompt.txt');

      expect(second.source).toBe('registry');
      expect(store.inner.versionCount('skill_gap_analysis')).toBe(1);
    });

    it('should fall back to the file content when auto-promotion is off', async () => {
      const template = await resolverWith(false).resolve('skill_gap_analysis', 'skill_gap_prompt.txt');

      expect(template.source).toBe('file');
      expect(template.render(FIELDS)).toBe('Skills: SQL. Target: ML Engineer.');
      expect(store.inner.versionCount('skill_gap_analysis')).toBe(1);
      expect(store.calls.some((call) => call.startsWith('promote:'))).toBe(false);
    });
  });

  describe('degraded registry', () => {
    it('should serve the raw file when the registry is unreachable', async () => {
      store.loadDown = true;
      store.registerDown = true;

      const template = await resolverWith().resolve('skill_gap_analysis', 'skill_gap_prompt.txt');

      expect(template.source).toBe('file');
      expect(template.version).toBeUndefined();
      expect(template.render(FIELDS)).toBe('Skills: SQL. Target: ML Engineer.');
    });

    it('should serve the raw file when promotion fails', async () => {
      store.promoteDown = true;

      const template = await resolverWith().resolve('skill_gap_analysis', 'skill_gap_prompt.txt');

      expect(template.source).toBe('file');
      expect(store.inner.versionCount('skill_gap_analysis')).toBe(1);
    });

    it('should serve the raw file when the retried lookup still fails', async () => {
      store.loadDown = true;

      const template = await resolverWith().resolve('skill_gap_analysis', 'skill_gap_prompt.txt');

      expect(template.source).toBe('file');
      expect(store.calls.filter((call) => call.startsWith('load:'))).toHaveLength(2);
    });
  });

  describe('exhausted tiers', () => {
    it('should fail with PromptUnavailableError when the prompt is unregistered and the file is missing', async () => {
      await expect(resolverWith().resolve('skill_gap_analysis', 'missing.txt')).rejects.toBeInstanceOf(
        PromptUnavailableError,
      );
      expect(store.calls).toEqual(['load:skill_gap_analysis@production']);
    });

    it('should fail with PromptUnavailableError when the registry is down and the file is missing', async () => {
      store.loadDown = true;
      await expect(resolverWith().resolve('skill_gap_analysis', 'missing.txt')).rejects.toMatchObject({
        code: 'PROMPT_UNAVAILABLE',
        details: { promptName: 'skill_gap_analysis' },
        cause: { code: 'FILE_NOT_FOUND' },
      });
    });
  });

  describe('readFile', () => {
    it('should read without touching the registry', async () => {
      const result = await resolverWith().readFile('skill_gap_prompt.txt');
      expect(result).toEqual({ ok: true, value: SKILL_GAP });
      expect(store.calls).toEqual([]);
    });
  });
});
