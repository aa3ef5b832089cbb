import { describe, it, expect } from 'vitest';
import { propagation, TraceFlags, type SpanContext } from '@opentelemetry/api';
import { SpanContextShim } from '../src/index.js';

const otelContext: SpanContext = {
  traceId: '0af7651916cd43dd8448eb211c80319c',
  spanId: 'b7ad6b7169203331',
  traceFlags: TraceFlags.SAMPLED,
};

function collect(ctx: SpanContextShim): Record<string, string> {
  const items: Record<string, string> = {};
  ctx.forEachBaggageItem((key, value) => {
    items[key] = value;
    return true;
  });
  return items;
}

describe('SpanContextShim', () => {
  it('トレース ID とスパン ID を 16 進文字列で返す', () => {
    const ctx = new SpanContextShim(otelContext, propagation.createBaggage());
    expect(ctx.toTraceId()).toBe('0af7651916cd43dd8448eb211c80319c');
    expect(ctx.toSpanId()).toBe('b7ad6b7169203331');
  });

  it('存在しないキーは undefined を返す', () => {
    const ctx = new SpanContextShim(otelContext, propagation.createBaggage());
    expect(ctx.getBaggageItem('missing')).toBeUndefined();
  });

  it('newWithKeyValue は元のインスタンスを変更しない', () => {
    const base = new SpanContextShim(
      otelContext,
      propagation.createBaggage({ tenant: { value: 't-1' } }),
    );
    const first = base.newWithKeyValue('user', 'alice');
    const second = first.newWithKeyValue('user', 'bob');

    expect(base.getBaggageItem('user')).toBeUndefined();
    expect(first.getBaggageItem('user')).toBe('alice');
    expect(second.getBaggageItem('user')).toBe('bob');
    expect(second.getBaggageItem('tenant')).toBe('t-1');
    expect(collect(base)).toEqual({ tenant: 't-1' });
  });

  it('newWithKeyValue はスパンコンテキストを引き継ぐ', () => {
    const base = new SpanContextShim(otelContext, propagation.createBaggage());
    const derived = base.newWithKeyValue('k', 'v');
    expect(derived.getSpanContext()).toEqual(otelContext);
    expect(derived.toSpanId()).toBe(base.toSpanId());
  });

  it('forEachBaggageItem は全エントリを走査する', () => {
    const ctx = new SpanContextShim(
      otelContext,
      propagation.createBaggage({ a: { value: '1' }, b: { value: '2' } }),
    );
    expect(collect(ctx)).toEqual({ a: '1', b: '2' });
  });

  it('visitor が false を返すと走査を打ち切る', () => {
    const ctx = new SpanContextShim(
      otelContext,
      propagation.createBaggage({ a: { value: '1' }, b: { value: '2' }, c: { value: '3' } }),
    );
    let visited = 0;
    ctx.forEachBaggageItem(() => {
      visited++;
      return false;
    });
    expect(visited).toBe(1);
  });

  it('clone は同じ Baggage を共有する', () => {
    const baggage = propagation.createBaggage({ a: { value: '1' } });
    const ctx = new SpanContextShim(otelContext, baggage);
    const cloned = ctx.clone();

    expect(cloned).not.toBe(ctx);
    expect(cloned.getBaggage()).toBe(baggage);
    expect(cloned.toTraceId()).toBe(ctx.toTraceId());
  });

  it('getSpanContext の戻り値を変更しても保持値は変わらない', () => {
    const ctx = new SpanContextShim(otelContext, propagation.createBaggage());
    const snapshot = ctx.getSpanContext();
    snapshot.spanId = '0000000000000001';
    expect(ctx.toSpanId()).toBe('b7ad6b7169203331');
    expect(ctx.getSpanContext().spanId).toBe('b7ad6b7169203331');
  });

  it('渡されたスパンコンテキストはコピーして保持する', () => {
    const source: SpanContext = { ...otelContext };
    const ctx = new SpanContextShim(source, propagation.createBaggage());
    source.spanId = '0000000000000001';
    expect(ctx.toSpanId()).toBe('b7ad6b7169203331');
  });
});
