/**
 * Gemini-backed review model using the @google/generative-ai SDK.
 */

import { GoogleGenerativeAI, type GenerativeModel } from '@google/generative-ai';
import type { ReviewModel, ReviewRequestOptions } from './types.js';

export interface GeminiReviewModelOptions {
  apiKey: string;
  model: string;
  temperature: number;
  topP: number;
  topK: number;
  maxOutputTokens: number;
}

export class GeminiReviewModel implements ReviewModel {
  readonly name: string;
  private readonly model: GenerativeModel;

  constructor(options: GeminiReviewModelOptions) {
    const genAI = new GoogleGenerativeAI(options.apiKey);
    this.name = options.model;
    this.model = genAI.getGenerativeModel({
      model: options.model,
      generationConfig: {
        temperature: options.temperature,
        topP: options.topP,
        topK: options.topK,
        maxOutputTokens: options.maxOutputTokens,
      },
    });
  }

  async generate(prompt: string, options: ReviewRequestOptions = {}): Promise<string> {
    const result = await this.model.generateContent(
      prompt,
      options.signal ? { signal: options.signal } : undefined
    );
    return result.response.text();
  }
}
