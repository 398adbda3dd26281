import { hostname } from 'node:os';
import pino from 'pino';
import { trace } from '@opentelemetry/api';

/**
 * Bindings stamped on every line, so output from the site and research
 * controllers can be told apart when both ship to the same sink.
 */
export function baseBindings(env: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const bindings: Record<string, string> = {};
  const kind = env.CONTROLLER_KIND?.trim().toLowerCase();
  if (kind) bindings.controllerKind = kind;
  const namespace = env.NAMESPACE?.trim();
  if (namespace) bindings.namespace = namespace;
  return bindings;
}

export const logger = pino({
  name: 'forgeline',
  level: process.env.LOG_LEVEL ?? 'info',
  base: { pid: process.pid, hostname: hostname(), ...baseBindings() },
  mixin() {
    const span = trace.getActiveSpan();
    if (!span) return {};
    const ctx = span.spanContext();
    return {
      traceId: ctx.traceId,
      spanId: ctx.spanId,
    };
  },
});
