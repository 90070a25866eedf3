/**
 * OpenAI Judge
 *
 * Asks a chat model for a holistic verdict over the extracted data. The
 * completion call sits behind JudgeCompletionClient so tests can swap in a
 * canned client.
 */

import OpenAI from 'openai';
import type { ValidationSettings } from '../config';
import { JudgeUnavailable, errorMessage } from '../errors';
import { logger } from '../logger';
import type { JudgeVerdict } from '../types';
import { JUDGE_SYSTEM_PROMPT, buildEvaluationPrompt } from './prompt';
import { parseJudgeResponse } from './response';
import { buildJudgeInput, type Judge, type JudgeCallOptions, type JudgeRequest } from './types';

export interface CompletionRequest {
  model: string;
  system: string;
  user: string;
}

export interface CompletionOptions {
  signal: AbortSignal;
  timeoutMs: number;
}

export interface JudgeCompletionClient {
  complete(request: CompletionRequest, options: CompletionOptions): Promise<string>;
}

export class OpenAiCompletionClient implements JudgeCompletionClient {
  private readonly openai: OpenAI;

  constructor(apiKey: string) {
    this.openai = new OpenAI({ apiKey });
  }

  async complete(request: CompletionRequest, options: CompletionOptions): Promise<string> {
    const response = await this.openai.chat.completions.create(
      {
        model: request.model,
        messages: [
          { role: 'system', content: request.system },
          { role: 'user', content: request.user },
        ],
        response_format: { type: 'json_object' },
        temperature: 0,
      },
      // Retries are owned by the pipeline's Judge invocation policy
      { signal: options.signal, timeout: options.timeoutMs, maxRetries: 0 }
    );

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new Error('Empty response from OpenAI');
    }

    logger.debug('OpenAI judge response', {
      request_id: response.id,
      tokens_used: response.usage?.total_tokens,
    });

    return content;
  }
}

export interface OpenAiJudgeSettings extends Pick<ValidationSettings, 'minSignatures' | 'requiredEmailDomain'> {
  model: string;
  timeoutMs: number;
}

export class OpenAiJudge implements Judge {
  readonly name = 'openai';

  constructor(
    private readonly client: JudgeCompletionClient,
    private readonly settings: OpenAiJudgeSettings
  ) {}

  async evaluate(request: JudgeRequest, options: JudgeCallOptions): Promise<JudgeVerdict> {
    const input = buildJudgeInput(request);

    logger.info('Requesting judge evaluation', {
      model: this.settings.model,
      document_type: input.document_type,
      signature_count: input.signature_count,
    });

    let content: string;
    try {
      content = await this.client.complete(
        {
          model: this.settings.model,
          system: JUDGE_SYSTEM_PROMPT,
          user: buildEvaluationPrompt(input, this.settings),
        },
        { signal: options.signal, timeoutMs: this.settings.timeoutMs }
      );
    } catch (error) {
      throw new JudgeUnavailable(`OpenAI request failed: ${errorMessage(error)}`, { cause: error });
    }

    const parsed = parseJudgeResponse(content, 'judge');
    if (!parsed.ok) {
      throw parsed.error;
    }
    return parsed.value;
  }
}
