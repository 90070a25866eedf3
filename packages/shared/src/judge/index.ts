/**
 * Judge selection by configuration
 */

import { getValidationSettings, type Config } from '../config';
import { OpenAiCompletionClient, OpenAiJudge, type JudgeCompletionClient } from './openai-judge';
import { RuleBasedJudge } from './rule-judge';
import type { Judge } from './types';

export function createJudge(cfg: Readonly<Config>, client?: JudgeCompletionClient): Judge {
  const settings = getValidationSettings(cfg);

  if (cfg.judgeProvider === 'openai') {
    if (!client && !cfg.openaiApiKey) {
      throw new Error('JUDGE_PROVIDER=openai requires OPENAI_API_KEY');
    }
    return new OpenAiJudge(client ?? new OpenAiCompletionClient(cfg.openaiApiKey), {
      model: cfg.llmModelJudge,
      timeoutMs: cfg.judgeTimeoutMs,
      minSignatures: settings.minSignatures,
      requiredEmailDomain: settings.requiredEmailDomain,
    });
  }

  return new RuleBasedJudge(settings);
}

export * from './types';
export * from './prompt';
export * from './response';
export * from './rule-judge';
export * from './openai-judge';
export * from './invoke';
