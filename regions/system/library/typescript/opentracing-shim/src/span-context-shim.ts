import type { Baggage, SpanContext as OtelSpanContext } from '@opentelemetry/api';
import { SpanContext } from 'opentracing';
import { renderId } from './id-render.js';

/** false を返すと走査を打ち切る。 */
export type BaggageVisitor = (key: string, value: string) => boolean;

/**
 * SpanContextShim は OpenTelemetry の SpanContext と Baggage を OpenTracing の
 * SpanContext として見せる。
 *
 * Baggage は不変値で、複数の SpanContextShim が同じ Baggage を共有しうる。
 * 変更は常に newWithKeyValue で新しいインスタンスを作って行い、既存の保持者には影響しない。
 */
export class SpanContextShim extends SpanContext {
  private readonly spanContext: OtelSpanContext;
  private readonly baggage: Baggage;

  constructor(spanContext: OtelSpanContext, baggage: Baggage) {
    super();
    this.spanContext = { ...spanContext };
    this.baggage = baggage;
  }

  /** 保持しているスナップショットのコピーを返す。 */
  getSpanContext(): OtelSpanContext {
    return { ...this.spanContext };
  }

  getBaggage(): Baggage {
    return this.baggage;
  }

  /**
   * key/value を 1 件追加 (または上書き) した Baggage を持つ新しい SpanContextShim を返す。
   * スパンコンテキストは同じものを引き継ぐ。
   */
  newWithKeyValue(key: string, value: string): SpanContextShim {
    return new SpanContextShim(this.spanContext, this.baggage.setEntry(key, { value }));
  }

  getBaggageItem(key: string): string | undefined {
    return this.baggage.getEntry(key)?.value;
  }

  forEachBaggageItem(visitor: BaggageVisitor): void {
    for (const [key, entry] of this.baggage.getAllEntries()) {
      if (!visitor(key, entry.value)) {
        return;
      }
    }
  }

  /** Baggage は共有したまま複製する。 */
  clone(): SpanContextShim {
    return new SpanContextShim(this.spanContext, this.baggage);
  }

  override toTraceId(): string {
    return renderId(this.spanContext.traceId);
  }

  override toSpanId(): string {
    return renderId(this.spanContext.spanId);
  }
}
