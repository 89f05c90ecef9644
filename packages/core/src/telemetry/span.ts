import { SpanStatusCode, trace } from '@opentelemetry/api';
import type { Attributes, Span } from '@opentelemetry/api';

const DEFAULT_TRACER = 'quay';

export interface SpanOptions {
    tracerName?: string;
    attributes?: Attributes;
}

/**
 * Run an async unit of work inside an active span.
 *
 * Exceptions are recorded on the span and rethrown. Without a registered
 * tracer provider the span is a no-op.
 */
export async function withSpan<T>(
    spanName: string,
    fn: (span: Span) => Promise<T>,
    options: SpanOptions = {}
): Promise<T> {
    const tracer = trace.getTracer(options.tracerName ?? DEFAULT_TRACER);

    return tracer.startActiveSpan(spanName, { attributes: options.attributes ?? {} }, async (span) => {
        try {
            const result = await fn(span);
            span.setStatus({ code: SpanStatusCode.OK });
            return result;
        } catch (error) {
            if (error instanceof Error) {
                span.recordException(error);
            }
            span.setStatus({
                code: SpanStatusCode.ERROR,
                message: error instanceof Error ? error.message : String(error),
            });
            throw error;
        } finally {
            span.end();
        }
    });
}
