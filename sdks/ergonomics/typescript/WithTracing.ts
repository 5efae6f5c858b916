import * as opentelemetry from '@opentelemetry/api';
import { getDefaultLoggingOptions, LoggingOptions, OperationLogger } from '../../runtime/typescript/logging';

/**
 * Configuration options for WithTracing
 */
export type TracingOptions = LoggingOptions;

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
    return typeof value === 'object' && value !== null && 'then' in value && typeof value.then === 'function';
}

function recordFailure(span: opentelemetry.Span, error: unknown): void {
    span.recordException(error instanceof Error ? error : String(error));
    span.setStatus({
        code: opentelemetry.SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : String(error)
    });
}

/**
 * Wraps a client (or any object) with OpenTelemetry tracing
 * @param api The instance to wrap with tracing
 * @param options Optional tracing configuration
 * @returns A traced version of the instance
 * @example
 * ```ts
 * const client = WithTracing(new OperationsClient({ transport, groups }), { logLevel: 'detailed' });
 * await client.invoke('list', {}, { group: 'widgets' }); // span "OperationsClient.invoke", operation.name = list
 * ```
 */
export function WithTracing<T extends object>(api: T, options?: TracingOptions): T {
    const tracer = opentelemetry.trace.getTracer('operations-runtime');
    const log = new OperationLogger({ ...getDefaultLoggingOptions(), ...options });

    return new Proxy(api, {
        get(target, prop, receiver) {
            const original: unknown = Reflect.get(target, prop, receiver);

            if (typeof original !== 'function') {
                return original;
            }

            const spanName = `${target.constructor.name}.${String(prop)}`;
            const wrappedFunction = function(...args: unknown[]): unknown {
                const span = tracer.startSpan(spanName);

                return opentelemetry.context.with(
                    opentelemetry.trace.setSpan(opentelemetry.context.active(), span),
                    () => {
                        span.setAttributes({
                            'api.class': target.constructor.name,
                            'api.method': String(prop),
                            'api.args.count': args.length
                        });
                        if (typeof args[0] === 'string') {
                            span.setAttribute('operation.name', args[0]);
                        }

                        log.basic(`🔍 ${spanName} - Called with ${args.length} arguments`);
                        log.detailed(`\n🔍 ${spanName} - Request:`, args);

                        let result: unknown;
                        try {
                            result = Reflect.apply(original, target, args);
                        } catch (error) {
                            recordFailure(span, error);
                            span.end();
                            throw error;
                        }

                        // Handles and generators are returned as they are; only promises are followed
                        if (!isPromiseLike(result)) {
                            span.setStatus({ code: opentelemetry.SpanStatusCode.OK });
                            span.end();
                            return result;
                        }

                        return Promise.resolve(result).then(
                            (value) => {
                                log.detailed(`\n🔍 ${spanName} - Response:`, value);
                                span.setStatus({ code: opentelemetry.SpanStatusCode.OK });
                                span.end();
                                return value;
                            },
                            (error: unknown) => {
                                recordFailure(span, error);
                                span.end();
                                throw error;
                            }
                        );
                    }
                );
            };

            // Preserve properties attached to the original function
            Object.setPrototypeOf(wrappedFunction, Object.getPrototypeOf(original));
            Object.assign(wrappedFunction, original);

            return wrappedFunction;
        }
    });
}
