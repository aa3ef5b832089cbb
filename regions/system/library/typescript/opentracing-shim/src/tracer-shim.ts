import {
  context,
  propagation,
  SpanKind,
  trace,
  type Link,
  type Tracer as OtelTracer,
  type TracerProvider,
} from '@opentelemetry/api';
import { REFERENCE_CHILD_OF, Tags, Tracer, type Reference, type SpanOptions } from 'opentracing';
import type { Logger } from 'pino';
import type { ShimConfig } from './config.js';
import { createLogger, silentLogger } from './logger.js';
import { SpanContextShim } from './span-context-shim.js';
import { SpanShim } from './span-shim.js';
import { toHrTime } from './time.js';

const SPAN_KIND_BY_TAG: ReadonlyMap<string, SpanKind> = new Map([
  [Tags.SPAN_KIND_RPC_CLIENT, SpanKind.CLIENT],
  [Tags.SPAN_KIND_RPC_SERVER, SpanKind.SERVER],
  [Tags.SPAN_KIND_MESSAGING_PRODUCER, SpanKind.PRODUCER],
  [Tags.SPAN_KIND_MESSAGING_CONSUMER, SpanKind.CONSUMER],
]);

export interface TracerShimOptions {
  logger?: Logger;
}

/**
 * TracerShim は OpenTracing の Tracer として SpanShim を生成する。
 * inject / extract は opentracing 既定の no-op のまま (ワイヤ伝搬は扱わない)。
 */
export class TracerShim extends Tracer {
  private readonly tracer: OtelTracer;
  private readonly logger: Logger;

  constructor(tracer: OtelTracer, options: TracerShimOptions = {}) {
    super();
    this.tracer = tracer;
    this.logger = options.logger ?? silentLogger;
  }

  protected override _startSpan(name: string, fields: SpanOptions): SpanShim {
    const references = fields.references ?? [];
    const parentRef = references.find((ref) => ref.type() === REFERENCE_CHILD_OF) ?? references[0];
    const parent = parentRef ? this.toShimContext(parentRef) : undefined;

    const links: Link[] = [];
    for (const ref of references) {
      if (ref === parentRef) continue;
      const linked = this.toShimContext(ref);
      if (linked) {
        links.push({ context: linked.getSpanContext(), attributes: { 'opentracing.ref_type': ref.type() } });
      }
    }

    const tags = fields.tags ?? {};
    const parentContext = parent
      ? trace.setSpanContext(context.active(), parent.getSpanContext())
      : trace.deleteSpan(context.active());

    const span = this.tracer.startSpan(
      name,
      {
        kind: SPAN_KIND_BY_TAG.get(tags[Tags.SPAN_KIND]) ?? SpanKind.INTERNAL,
        startTime: toHrTime(fields.startTime),
        links,
      },
      parentContext,
    );

    const baggage = parent?.getBaggage() ?? propagation.createBaggage();
    const shim = new SpanShim(this, span, baggage, { logger: this.logger });
    shim.addTags(tags);
    return shim;
  }

  private toShimContext(ref: Reference): SpanContextShim | undefined {
    const referenced = ref.referencedContext();
    if (referenced instanceof SpanContextShim) {
      return referenced;
    }
    this.logger.debug({ refType: ref.type() }, 'ignoring reference to a non-shim span context');
    return undefined;
  }
}

/**
 * createTracerShim は設定から TracerShim を生成する。
 * provider 未指定の場合はグローバルの TracerProvider を使う。
 */
export function createTracerShim(cfg: ShimConfig, provider?: TracerProvider): TracerShim {
  const tracer = provider
    ? provider.getTracer(cfg.tracerName, cfg.tracerVersion)
    : trace.getTracer(cfg.tracerName, cfg.tracerVersion);
  return new TracerShim(tracer, { logger: createLogger(cfg) });
}
