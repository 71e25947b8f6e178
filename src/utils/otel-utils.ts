import { trace, metrics, Span, SpanKind, SpanStatusCode, Tracer } from "@opentelemetry/api";
import {
    ATTR_HTTP_REQUEST_METHOD,
    ATTR_HTTP_RESPONSE_STATUS_CODE,
    ATTR_URL_FULL,
} from "@opentelemetry/semantic-conventions";

export type SpanAttributes = Record<string, string | number | boolean>;

export const serverTracer = trace.getTracer("train-picker-server");

const meter = metrics.getMeter("train-picker");

export const httpRequestDuration = meter.createHistogram("http_request_duration_ms", {
    description: "Duration of outbound HTTP requests in milliseconds",
    unit: "ms",
});

export const httpRequestCounter = meter.createCounter("http_requests_total", {
    description: "Total number of outbound HTTP requests",
});

/**
 * Client span for an outbound HTTP request.
 */
export function createHttpSpan(
    tracer: Tracer,
    spanName: string,
    request: { url: string; method: string },
    customAttributes?: SpanAttributes
): Span {
    return tracer.startSpan(spanName, {
        kind: SpanKind.CLIENT,
        attributes: {
            [ATTR_HTTP_REQUEST_METHOD]: request.method,
            [ATTR_URL_FULL]: request.url,
            ...customAttributes,
        },
    });
}

export function setResponseAttributes(span: Span, statusCode: number) {
    span.setAttributes({
        [ATTR_HTTP_RESPONSE_STATUS_CODE]: statusCode,
    });

    if (statusCode >= 400) {
        span.setStatus({
            code: SpanStatusCode.ERROR,
            message: `HTTP ${statusCode}`,
        });
    } else {
        span.setStatus({ code: SpanStatusCode.OK });
    }
}

export function recordSpanError(span: Span, error: unknown, attributes?: SpanAttributes) {
    const err = error instanceof Error ? error : new Error(String(error));

    span.recordException(err);
    span.setStatus({
        code: SpanStatusCode.ERROR,
        message: err.message,
    });
    span.setAttributes({
        "error.type": err.name,
        "error.message": err.message,
        ...attributes,
    });
}

/**
 * fetch() wrapped in a client span, with request count and duration metrics.
 */
export async function instrumentedFetch(
    tracer: Tracer,
    spanName: string,
    url: string,
    options: RequestInit = {},
    customAttributes?: SpanAttributes,
    fetchImpl: typeof fetch = fetch
): Promise<Response> {
    const startTime = Date.now();
    const method = options.method || "GET";
    const host = new URL(url).hostname;
    const span = createHttpSpan(tracer, spanName, { url, method }, customAttributes);

    try {
        const response = await fetchImpl(url, options);

        setResponseAttributes(span, response.status);
        httpRequestDuration.record(Date.now() - startTime, {
            method,
            status_code: String(response.status),
            host,
        });
        httpRequestCounter.add(1, { method, status_code: String(response.status), host });

        return response;
    } catch (error) {
        recordSpanError(span, error);
        httpRequestDuration.record(Date.now() - startTime, { method, status_code: "0", host });
        httpRequestCounter.add(1, { method, status_code: "0", host });
        throw error;
    } finally {
        span.end();
    }
}

export function createProcessingSpan(tracer: Tracer, spanName: string, attributes?: SpanAttributes): Span {
    return tracer.startSpan(spanName, {
        kind: SpanKind.INTERNAL,
        attributes,
    });
}

/**
 * Runs `fn` inside an internal span; the span records the error and ends either way.
 */
export function instrumentSync<T>(
    tracer: Tracer,
    spanName: string,
    fn: (span: Span) => T,
    attributes?: SpanAttributes
): T {
    const span = createProcessingSpan(tracer, spanName, attributes);

    try {
        const result = fn(span);
        span.setStatus({ code: SpanStatusCode.OK });
        return result;
    } catch (error) {
        recordSpanError(span, error);
        throw error;
    } finally {
        span.end();
    }
}
