import {
  SpanStatusCode,
  type Attributes,
  type Baggage,
  type HrTime,
  type Span as OtelSpan,
} from '@opentelemetry/api';
import { Span, type Tracer } from 'opentracing';
import type { Logger } from 'pino';
import {
  DEFAULT_EVENT_NAME,
  ERROR_TAG,
  ERROR_TAG_FALSE,
  ERROR_TAG_TRUE,
  EVENT_FIELD,
  EXCEPTION_EVENT_NAME,
  EXCEPTION_FIELD_KEYS,
} from './constants.js';
import { ContextCell } from './context-cell.js';
import { silentLogger, spanLogger } from './logger.js';
import { SpanContextShim } from './span-context-shim.js';
import { toHrTime } from './time.js';
import { attributeFromValue, stringFromValue } from './value.js';

/** log 呼び出しの 1 フィールド。順序は event キーの探索にのみ意味を持つ。 */
export type EventEntry = readonly [key: string, value: unknown];

export interface SpanShimOptions {
  logger?: Logger;
}

/**
 * SpanShim は OpenTracing の Span 呼び出しを OpenTelemetry の Span へ変換する。
 *
 * 操作はすべて例外を送出しない。SDK が投げた例外は warn ログに残して呼び出し元へは返さない。
 */
export class SpanShim extends Span {
  private readonly span: OtelSpan;
  private readonly tracerShim: Tracer;
  private readonly contextCell: ContextCell<SpanContextShim>;
  private readonly logger: Logger;

  constructor(tracerShim: Tracer, span: OtelSpan, baggage: Baggage, options: SpanShimOptions = {}) {
    super();
    this.tracerShim = tracerShim;
    this.span = span;
    const spanContext = span.spanContext();
    this.contextCell = new ContextCell(new SpanContextShim(spanContext, baggage));
    this.logger = spanLogger(options.logger ?? silentLogger, spanContext);
  }

  /** 下位の OpenTelemetry Span を返す。 */
  getSpan(): OtelSpan {
    return this.span;
  }

  /**
   * 順序付きフィールド列で log を記録する。timestamp は epoch ミリ秒。
   * 同じキーが複数ある場合、属性には後のものが残る。
   */
  logEntries(entries: readonly EventEntry[], timestamp?: number): this {
    this.guard('log', () => this.logImpl(entries, timestamp));
    return this;
  }

  protected override _context(): SpanContextShim {
    return this.contextCell.read((ctx) => ctx);
  }

  protected override _tracer(): Tracer {
    return this.tracerShim;
  }

  protected override _setOperationName(name: string): void {
    this.guard('setOperationName', () => {
      this.span.updateName(name);
    });
  }

  protected override _setBaggageItem(key: string, value: string): void {
    this.guard('setBaggageItem', () => {
      this.contextCell.update((ctx) => ctx.newWithKeyValue(key, value));
    });
  }

  /** 存在しないキーは空文字列を返す。 */
  protected override _getBaggageItem(key: string): string {
    return this.guard('getBaggageItem', () => this.contextCell.read((ctx) => ctx.getBaggageItem(key))) ?? '';
  }

  protected override _addTags(keyValuePairs: Record<string, unknown>): void {
    for (const [key, value] of Object.entries(keyValuePairs)) {
      this.guard('setTag', () => this.setTagImpl(key, value));
    }
  }

  protected override _log(keyValuePairs: Record<string, unknown>, timestamp?: number): void {
    this.guard('log', () => this.logImpl(Object.entries(keyValuePairs), timestamp));
  }

  protected override _finish(finishTime?: number): void {
    this.guard('finish', () => {
      const endTime = this.convertTime('finish', finishTime);
      if (endTime) {
        this.span.end(endTime);
      } else {
        this.span.end();
      }
    });
  }

  private setTagImpl(key: string, value: unknown): void {
    if (key === ERROR_TAG) {
      this.handleError(value);
      return;
    }
    this.span.setAttribute(key, attributeFromValue(value));
  }

  /**
   * error タグを status にマッピングする。
   * "true" は ERROR、"false" は OK、それ以外は UNSET。
   */
  private handleError(value: unknown): void {
    const str = stringFromValue(value);
    let code = SpanStatusCode.UNSET;
    if (str === ERROR_TAG_TRUE) {
      code = SpanStatusCode.ERROR;
    } else if (str === ERROR_TAG_FALSE) {
      code = SpanStatusCode.OK;
    } else {
      this.logger.debug({ value: str }, 'unrecognized error tag value, status set to UNSET');
    }
    this.span.setStatus({ code });
  }

  private logImpl(entries: readonly EventEntry[], timestamp: number | undefined): void {
    const event = entries.find(([key]) => key === EVENT_FIELD);
    let name = event ? stringFromValue(event[1]) : DEFAULT_EVENT_NAME;
    const isError = name === ERROR_TAG;
    if (isError) {
      name = EXCEPTION_EVENT_NAME;
    }

    // fromEntries は __proto__ などのキーも自身のプロパティとして持つ
    const attributes: Attributes = Object.fromEntries(
      entries.map(([key, value]) => [
        isError ? (EXCEPTION_FIELD_KEYS.get(key) ?? key) : key,
        attributeFromValue(value),
      ]),
    );

    const eventTime = this.convertTime('log', timestamp);
    if (eventTime) {
      this.span.addEvent(name, attributes, eventTime);
    } else {
      this.span.addEvent(name, attributes);
    }
  }

  private convertTime(operation: string, millis: number | undefined): HrTime | undefined {
    const hrTime = toHrTime(millis);
    if (millis !== undefined && !hrTime) {
      this.logger.warn({ operation, timestamp: millis }, 'invalid timestamp, using current time');
    }
    return hrTime;
  }

  private guard<R>(operation: string, fn: () => R): R | undefined {
    try {
      return fn();
    } catch (err) {
      this.logger.warn({ err, operation }, 'opentracing shim operation failed');
      return undefined;
    }
  }
}
