import { GoogleGenAI } from '@google/genai';
import { errorMessage, ModelInvocationError } from '../errors';
import { logger } from '../logger';

/**
 * A hosted text model: one prompt in, one text response out.
 */
export interface TextModel {
  generate(prompt: string): Promise<string>;
}

export type TextModelFactory = (apiKey: string) => TextModel;

export class GeminiTextModel implements TextModel {
  private readonly ai: GoogleGenAI;

  constructor(apiKey: string, private readonly model: string) {
    this.ai = new GoogleGenAI({ apiKey });
  }

  async generate(prompt: string): Promise<string> {
    try {
      const response = await this.ai.models.generateContent({
        model: this.model,
        contents: prompt,
      });
      return response.text ?? '';
    } catch (error) {
      logger.error(`❌ Error calling Gemini API: ${errorMessage(error)}`);
      throw new ModelInvocationError(`Gemini request failed: ${errorMessage(error)}`, error);
    }
  }
}

export const createGeminiModelFactory = (model: string): TextModelFactory =>
  (apiKey: string) => new GeminiTextModel(apiKey, model);
