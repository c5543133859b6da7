/**
 * Named spans around pipeline stages.
 *
 * A span runs its body in a child context with a fresh span id, so log lines
 * emitted inside it carry the span. Spans observe; they never change the
 * outcome of the body.
 */

import { ulid } from 'ulid';
import { getContext, runInChildContext } from './context';
import { logger, type LogContext } from './logger';
import { stageDurationHistogram } from './metrics';

export async function withSpan<T>(
  name: string,
  input: LogContext,
  fn: () => Promise<T>,
  describeOutput?: (output: T) => LogContext
): Promise<T> {
  const spanId = ulid();
  const parentSpanId = getContext()?.spanId;

  return runInChildContext({ spanId, parentSpanId }, async () => {
    const startTime = Date.now();
    logger.debug('Span started', { span: name, parentSpanId, input });

    try {
      const output = await fn();
      const durationMs = Date.now() - startTime;
      stageDurationHistogram.observe({ stage: name, status: 'success' }, durationMs / 1000);
      logger.debug('Span finished', {
        span: name,
        durationMs,
        output: describeOutput ? describeOutput(output) : undefined,
      });
      return output;
    } catch (error) {
      const durationMs = Date.now() - startTime;
      stageDurationHistogram.observe({ stage: name, status: 'error' }, durationMs / 1000);
      logger.warn('Span failed', {
        span: name,
        durationMs,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  });
}
