/**
 * Telemetry Sinks
 *
 * Fire-and-forget trace export. A sink failure is logged and never reaches
 * the caller, so it cannot change a verdict.
 */

import type { Langfuse } from 'langfuse' with { 'resolution-mode': 'import' };
import type { Config } from './config';
import { getContext } from './context';
import { logger } from './logger';

export type TraceName = 'judge_evaluation' | 'pdf_validation_complete' | 'pdf_validation_error';

export interface TelemetryTrace {
  name: TraceName;
  input: unknown;
  output: unknown;
  metadata?: Record<string, unknown>;
}

export interface TelemetrySink {
  record(trace: TelemetryTrace): void;
  flush(): Promise<void>;
}

function contextMetadata(metadata: Record<string, unknown> = {}): Record<string, unknown> {
  const context = getContext();
  return {
    correlation_id: context?.correlationId,
    run_id: context?.runId,
    document_id: context?.documentId,
    ...metadata,
  };
}

/**
 * Writes each trace as a structured log line
 */
export class LogTelemetrySink implements TelemetrySink {
  record(trace: TelemetryTrace): void {
    logger.info('Telemetry trace', {
      trace_name: trace.name,
      metadata: contextMetadata(trace.metadata),
    });
  }

  flush(): Promise<void> {
    return Promise.resolve();
  }
}

export interface LangfuseSettings {
  publicKey: string;
  secretKey: string;
  baseUrl: string;
}

/**
 * Exports traces to Langfuse. The client library is loaded on the first
 * trace, so processes without tracing keys never import it.
 */
export class LangfuseTelemetrySink implements TelemetrySink {
  private client: Promise<Langfuse> | undefined;
  private pending: Promise<void> = Promise.resolve();

  constructor(private readonly settings: LangfuseSettings) {}

  private getClient(): Promise<Langfuse> {
    if (!this.client) {
      this.client = import('langfuse').then(
        ({ Langfuse: LangfuseClient }) =>
          new LangfuseClient({
            publicKey: this.settings.publicKey,
            secretKey: this.settings.secretKey,
            baseUrl: this.settings.baseUrl,
          })
      );
    }
    return this.client;
  }

  record(trace: TelemetryTrace): void {
    // Read the run context now; it is gone by the time the client loads
    const body = {
      name: trace.name,
      input: trace.input,
      output: trace.output,
      metadata: contextMetadata(trace.metadata),
    };

    this.pending = this.pending
      .then(async () => {
        const client = await this.getClient();
        client.trace(body);
      })
      .catch((error: unknown) => {
        logger.warn('Langfuse trace failed', {
          trace_name: trace.name,
          error: error instanceof Error ? error.message : String(error),
        });
      });
  }

  async flush(): Promise<void> {
    await this.pending;
    if (!this.client) return;

    try {
      const client = await this.client;
      await client.flushAsync();
    } catch (error) {
      logger.warn('Langfuse flush failed', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

/**
 * Langfuse when both keys are configured, structured logs otherwise
 */
export function createTelemetrySink(
  cfg: Pick<Config, 'langfusePublicKey' | 'langfuseSecretKey' | 'langfuseHost'>
): TelemetrySink {
  if (cfg.langfusePublicKey && cfg.langfuseSecretKey) {
    logger.info('Langfuse telemetry enabled', { host: cfg.langfuseHost });
    return new LangfuseTelemetrySink({
      publicKey: cfg.langfusePublicKey,
      secretKey: cfg.langfuseSecretKey,
      baseUrl: cfg.langfuseHost,
    });
  }
  return new LogTelemetrySink();
}
