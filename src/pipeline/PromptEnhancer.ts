/**
 * PromptEnhancer - Expands short user prompts through the local LLM
 *
 * The instruction template lives in `{promptsPath}/enhance.hbs`; a built-in
 * copy is used when the file is missing. Enhancement fails open: any LLM
 * problem yields the original prompt.
 */

import fs from 'fs/promises';
import path from 'path';
import Handlebars from 'handlebars';
import { createLogger } from '../utils/logger.js';
import { getErrorMessage } from '../utils/ErrorHandler.js';
import type { TextGenerator } from '../llm/types.js';

const logger = createLogger('PromptEnhancer');

type HandlebarsTemplateDelegate = ReturnType<typeof Handlebars.compile>;

export const ENHANCE_TEMPLATE_FILE = 'enhance.hbs';

export const FALLBACK_ENHANCE_TEMPLATE = `System: You are a creative AI assistant that enhances image generation prompts.
Take the user's simple request and expand it into a detailed, vivid description that would
produce stunning visual results. Focus on:
- Visual details (lighting, composition, colors, textures)
- Artistic style and mood
- Technical photography/art terms
- Environmental context

Keep the core idea but make it more descriptive and artistic.
{{#if context}}

Context from previous interactions: {{context}}
{{/if}}

User request: {{prompt}}

Enhanced prompt:`;

const THINK_BLOCK = /<think>[\s\S]*?<\/think>/gi;

export interface PromptEnhancerOptions {
  /** Directory holding enhance.hbs */
  promptsPath?: string;
}

export class PromptEnhancer {
  private generator: TextGenerator;
  private promptsPath: string;
  private template: HandlebarsTemplateDelegate | null = null;

  constructor(generator: TextGenerator, options: PromptEnhancerOptions = {}) {
    this.generator = generator;
    this.promptsPath = options.promptsPath ?? './prompts';
  }

  /**
   * Elaborate `prompt`, optionally informed by past requests.
   * Never rejects.
   */
  async enhance(prompt: string, context: string = ''): Promise<string> {
    try {
      const request = await this.buildRequest(prompt, context);
      const result = await this.generator.generate(request);
      const text = (result.response ?? '').replace(THINK_BLOCK, '').trim();

      if (!text) {
        logger.warn('LLM returned no enhanced prompt, using original');
        return prompt;
      }

      logger.debug('Prompt enhanced', { originalLength: prompt.length, enhancedLength: text.length });
      return text;
    } catch (error) {
      logger.warn('Prompt enhancement failed, using original prompt', {
        error: getErrorMessage(error)
      });
      return prompt;
    }
  }

  /**
   * Render the full LLM request for a prompt and context
   */
  async buildRequest(prompt: string, context: string = ''): Promise<string> {
    const template = await this.loadTemplate();
    return template({ prompt, context: context.trim() }).trim();
  }

  /**
   * Load and compile the template, cached after the first call
   */
  private async loadTemplate(): Promise<HandlebarsTemplateDelegate> {
    if (this.template) {
      return this.template;
    }

    const fullPath = path.resolve(this.promptsPath, ENHANCE_TEMPLATE_FILE);

    try {
      const content = await fs.readFile(fullPath, 'utf-8');
      this.template = Handlebars.compile(content, { noEscape: true });
      logger.debug('Enhancement template loaded', { fullPath });
    } catch (error) {
      logger.warn('Enhancement template not found, using built-in template', {
        fullPath,
        error: getErrorMessage(error)
      });
      this.template = Handlebars.compile(FALLBACK_ENHANCE_TEMPLATE, { noEscape: true });
    }

    return this.template;
  }
}

export default PromptEnhancer;
