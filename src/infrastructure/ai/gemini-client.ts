/**
 * Gemini model client
 */

import { GoogleGenerativeAI, type GenerationConfig } from '@google/generative-ai';
import type { Logger } from 'pino';
import { createTimer } from '../../lib/logger';
import { CONSTANTS } from '../../config/app-config';
import { ModelError, isCareerCompanionError, toError } from '../../lib/errors';
import type { SecretProvider } from '../secrets';

export const ASSISTANT_PREAMBLE = 'You are a career planning assistant. ';
export const EMPTY_RESPONSE_TEXT =
  "I apologize, but I couldn't generate a response. Please try again.";

export interface ModelClient {
  /** Model identifier recorded alongside each interaction */
  readonly modelName: string;
  generate(prompt: string): Promise<string>;
}

export interface GeminiSettings {
  name: string;
  timeoutMs: number;
  temperature: number;
  topP: number;
  topK: number;
  maxOutputTokens: number;
}

/**
 * The parts of a Gemini GenerativeModel the client calls
 */
export interface GenerativeModelLike {
  generateContent(prompt: string): Promise<{
    response: { candidates?: unknown[]; text(): string };
  }>;
}

export type GenerativeModelFactory = (
  apiKey: string,
  settings: GeminiSettings,
) => GenerativeModelLike;

export const createGenerativeModel: GenerativeModelFactory = (apiKey, settings) => {
  const generationConfig: GenerationConfig = {
    temperature: settings.temperature,
    topP: settings.topP,
    topK: settings.topK,
    maxOutputTokens: settings.maxOutputTokens,
  };
  return new GoogleGenerativeAI(apiKey).getGenerativeModel(
    { model: settings.name, generationConfig },
    { timeout: settings.timeoutMs },
  );
};

export class GeminiClient implements ModelClient {
  private model: Promise<GenerativeModelLike> | undefined;
  private readonly logger: Logger;

  constructor(
    private readonly settings: GeminiSettings,
    private readonly secrets: SecretProvider,
    logger: Logger,
    private readonly modelFactory: GenerativeModelFactory = createGenerativeModel,
  ) {
    this.logger = logger.child({ component: 'GeminiClient', model: settings.name });
  }

  get modelName(): string {
    return this.settings.name;
  }

  async generate(prompt: string): Promise<string> {
    const timer = createTimer(this.logger, 'generate', { promptLength: prompt.length });
    try {
      const model = await this.getModel();
      const { response } = await model.generateContent(`${ASSISTANT_PREAMBLE}${prompt}`);
      if (!response.candidates || response.candidates.length === 0) {
        timer.end({ empty: true });
        return EMPTY_RESPONSE_TEXT;
      }
      const text = response.text();
      timer.end({ responseLength: text.length });
      return text;
    } catch (error) {
      timer.error(error);
      if (isCareerCompanionError(error)) {
        throw new ModelError('Model credentials are unavailable', { model: this.settings.name }, error);
      }
      throw new ModelError('Content generation failed', { model: this.settings.name }, toError(error));
    }
  }

  /**
   * Model handle, built once the API key has been fetched
   */
  private getModel(): Promise<GenerativeModelLike> {
    if (!this.model) {
      this.model = this.secrets
        .getSecret(CONSTANTS.SECRETS.GEMINI_API_KEY)
        .then((apiKey) => this.modelFactory(apiKey, this.settings));
      this.model.catch(() => {
        this.model = undefined;
      });
    }
    return this.model;
  }
}
