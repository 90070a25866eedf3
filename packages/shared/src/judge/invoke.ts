/**
 * Judge Invocation Policy
 *
 * Every attempt is bounded by a timeout; unavailability is retried up to
 * `maxRetries` times. A malformed answer is not retried.
 */

import { JudgeMalformedResponse, JudgeUnavailable, errorMessage, ok, err, type Result } from '../errors';
import { logger } from '../logger';
import { judgeRequestDurationHistogram, judgeRequestsCounter } from '../metrics';
import type { JudgeVerdict } from '../types';
import type { Judge, JudgeRequest } from './types';

export interface JudgeInvocationPolicy {
  timeoutMs: number;
  maxRetries: number;
}

class JudgeTimeout extends Error {
  constructor(timeoutMs: number) {
    super(`Judge timed out after ${timeoutMs}ms`);
    this.name = 'JudgeTimeout';
  }
}

async function evaluateWithTimeout(judge: Judge, request: JudgeRequest, timeoutMs: number): Promise<JudgeVerdict> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // Reject before aborting so the timeout settles the race, not the Judge's abort error
      reject(new JudgeTimeout(timeoutMs));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([judge.evaluate(request, { signal: controller.signal }), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function attemptStatus(error: unknown): string {
  if (error instanceof JudgeTimeout) return 'timeout';
  if (error instanceof JudgeMalformedResponse) return 'malformed';
  return 'error';
}

export async function invokeJudge(
  judge: Judge,
  request: JudgeRequest,
  policy: JudgeInvocationPolicy
): Promise<Result<JudgeVerdict, JudgeUnavailable | JudgeMalformedResponse>> {
  const attempts = policy.maxRetries + 1;
  let lastError = '';

  for (let attempt = 1; attempt <= attempts; attempt++) {
    const startTime = Date.now();
    try {
      const verdict = await evaluateWithTimeout(judge, request, policy.timeoutMs);
      judgeRequestsCounter.inc({ provider: judge.name, status: 'success' });
      judgeRequestDurationHistogram.observe({ provider: judge.name }, (Date.now() - startTime) / 1000);
      return ok(verdict);
    } catch (error) {
      judgeRequestsCounter.inc({ provider: judge.name, status: attemptStatus(error) });
      judgeRequestDurationHistogram.observe({ provider: judge.name }, (Date.now() - startTime) / 1000);

      if (error instanceof JudgeMalformedResponse) {
        logger.warn('Judge returned an unusable response', {
          judge: judge.name,
          error: error.message,
          preview: error.preview,
        });
        return err(error);
      }

      lastError = errorMessage(error);
      logger.warn('Judge attempt failed', {
        judge: judge.name,
        attempt,
        max_attempts: attempts,
        error: lastError,
      });
    }
  }

  return err(new JudgeUnavailable(`Judge unavailable after ${attempts} attempt(s): ${lastError}`));
}
