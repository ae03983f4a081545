/**
 * Rubric Sources
 *
 * Problem metadata lookup. Lookups are best-effort: any failure yields
 * null and grading continues without criteria.
 */

import { createLogger, errorMessage, type Logger } from 'gradekit-core';
import { RubricDataSchema } from '../review/schema.js';
import type { RubricData } from '../review/types.js';

export interface RubricSource {
  fetch(key: string): Promise<RubricData | null>;
}

export type FetchFn = typeof fetch;

export interface HttpRubricSourceOptions {
  baseUrl: string;
  /** Sent as the x-api-key header when set */
  apiKey: string | null;
  timeoutMs: number;
  fetch?: FetchFn;
  logger?: Logger;
}

/**
 * Problem id for a topic or file name: every `.py` removed, whitespace trimmed.
 */
export function problemIdOf(key: string): string {
  return key.replaceAll('.py', '').trim();
}

/**
 * Reads `<baseUrl>/problems/<id>` from the problem bank.
 */
export class HttpRubricSource implements RubricSource {
  private readonly baseUrl: string;
  private readonly apiKey: string | null;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;
  private readonly logger: Logger;

  constructor(options: HttpRubricSourceOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs;
    this.fetchFn = options.fetch ?? fetch;
    this.logger = options.logger ?? createLogger('rubric');
  }

  async fetch(key: string): Promise<RubricData | null> {
    const id = problemIdOf(key);
    if (!id) {
      return null;
    }

    const url = `${this.baseUrl}/problems/${encodeURIComponent(id)}`;

    try {
      const response = await this.fetchFn(url, {
        headers: this.apiKey ? { 'x-api-key': this.apiKey } : {},
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!response.ok) {
        this.logger.debug(`Problem '${id}' not found (HTTP ${response.status})`);
        return null;
      }

      const parsed = RubricDataSchema.safeParse(await response.json());
      if (!parsed.success) {
        this.logger.warn(`Problem '${id}' has an unexpected shape`);
        return null;
      }
      return parsed.data;
    } catch (error) {
      this.logger.warn(`Failed to fetch problem '${id}': ${errorMessage(error)}`);
      return null;
    }
  }
}

/**
 * Serves the same rubric for every key (or none at all).
 */
export class StaticRubricSource implements RubricSource {
  constructor(private readonly rubric: RubricData | null = null) {}

  async fetch(_key: string): Promise<RubricData | null> {
    return this.rubric;
  }
}
