import type { LanguageModel, ModelMessage } from 'ai';

import { generateText } from 'ai';

/**
 * Configuration for a text-producing model call with fallback support
 */
export interface LLMCallConfig {
  /**
   * Messages sent to the model. Image parts carry page or region bytes.
   */
  messages: ModelMessage[];

  /**
   * Primary model for the call (required)
   */
  primaryModel: LanguageModel;

  /**
   * Fallback model tried once the primary model exhausts maxRetries (optional)
   */
  fallbackModel?: LanguageModel;

  /**
   * Maximum retry count per model
   */
  maxRetries: number;

  /**
   * Temperature for generation (optional, 0-1)
   */
  temperature?: number;

  /**
   * Abort signal for cancellation support
   */
  abortSignal?: AbortSignal;

  /**
   * Component name for tracking (e.g., 'GroundingOcrBackend')
   */
  component: string;

  /**
   * Phase name for tracking (e.g., 'ocr', 'caption')
   */
  phase: string;
}

/**
 * Token usage information with model tracking
 */
export interface ExtendedTokenUsage {
  component: string;
  phase: string;
  model: 'primary' | 'fallback';
  modelName: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/**
 * Result of LLM call including usage information
 */
export interface LLMCallResult {
  output: string;
  usage: ExtendedTokenUsage;
  usedFallback: boolean;
}

interface GenerationResponse {
  text: string;
  usage?: {
    inputTokens?: number;
    outputTokens?: number;
    totalTokens?: number;
  };
}

/**
 * LLMCaller - Centralized caller for vision and text models
 *
 * Wraps AI SDK's generateText:
 * 1. Try primary model with maxRetries
 * 2. If all attempts fail and fallbackModel provided, try fallback with maxRetries
 * 3. Return the generated text with usage and a model indicator
 *
 * @example
 * ```typescript
 * const result = await LLMCaller.call({
 *   messages: [
 *     {
 *       role: 'user',
 *       content: [
 *         { type: 'text', text: '<|grounding|>Convert the document to markdown.' },
 *         { type: 'image', image: pageBytes, mediaType: 'image/png' },
 *       ],
 *     },
 *   ],
 *   primaryModel: ollama.chat('deepseek-ocr'),
 *   maxRetries: 2,
 *   component: 'GroundingOcrBackend',
 *   phase: 'ocr',
 * });
 * ```
 */
export class LLMCaller {
  /**
   * Model identifier used in usage reports.
   */
  static extractModelName(model: LanguageModel): string {
    return typeof model === 'string' ? model : model.modelId;
  }

  private static buildUsage(
    config: LLMCallConfig,
    modelName: string,
    response: GenerationResponse,
    usedFallback: boolean,
  ): ExtendedTokenUsage {
    return {
      component: config.component,
      phase: config.phase,
      model: usedFallback ? 'fallback' : 'primary',
      modelName,
      inputTokens: response.usage?.inputTokens ?? 0,
      outputTokens: response.usage?.outputTokens ?? 0,
      totalTokens: response.usage?.totalTokens ?? 0,
    };
  }

  private static generate(
    config: LLMCallConfig,
    model: LanguageModel,
  ): Promise<GenerationResponse> {
    return generateText({
      model,
      messages: config.messages,
      temperature: config.temperature,
      maxRetries: config.maxRetries,
      abortSignal: config.abortSignal,
    });
  }

  /**
   * Call the model with retry and fallback support.
   *
   * @throws the primary model's error when no fallback is configured or the
   * call was aborted, otherwise the fallback model's error
   */
  static async call(config: LLMCallConfig): Promise<LLMCallResult> {
    const primaryModelName = this.extractModelName(config.primaryModel);

    try {
      const response = await this.generate(config, config.primaryModel);

      return {
        output: response.text,
        usage: this.buildUsage(config, primaryModelName, response, false),
        usedFallback: false,
      };
    } catch (primaryError) {
      // Aborted calls do not fall back
      if (config.abortSignal?.aborted) {
        throw primaryError;
      }

      if (!config.fallbackModel) {
        throw primaryError;
      }

      const fallbackModelName = this.extractModelName(config.fallbackModel);
      const response = await this.generate(config, config.fallbackModel);

      return {
        output: response.text,
        usage: this.buildUsage(config, fallbackModelName, response, true),
        usedFallback: true,
      };
    }
  }
}
