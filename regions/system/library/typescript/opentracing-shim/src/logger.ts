import { pino, type Logger, type LoggerOptions } from 'pino';
import { trace, type SpanContext } from '@opentelemetry/api';
import type { ShimConfig } from './config.js';

/**
 * createLogger は pino ベースの構造化ロガーを生成する。
 * トレーサー名を標準フィールドとして付与し、アクティブな OpenTelemetry スパンがあれば
 * trace_id / span_id を注入する。log.format が "text" の場合は pino-pretty を使う。
 */
export function createLogger(cfg: ShimConfig): Logger {
  const options: LoggerOptions = {
    level: cfg.log.level,
    base: {
      tracer: cfg.tracerName,
    },
    mixin() {
      const span = trace.getActiveSpan();
      if (span) {
        const spanContext = span.spanContext();
        return {
          trace_id: spanContext.traceId,
          span_id: spanContext.spanId,
        };
      }
      return {};
    },
  };

  if (cfg.log.format === 'text') {
    options.transport = {
      target: 'pino-pretty',
      options: { colorize: true, translateTime: 'SYS:standard' },
    };
  }

  return pino(options);
}

/**
 * spanLogger は SpanShim 用の子ロガーを返す。
 * shim 操作は対象スパンがアクティブでない場所からも呼ばれるため、
 * mixin の trace_id / span_id とは別に対象スパンの ID を ot_trace_id / ot_span_id として付与する。
 */
export function spanLogger(logger: Logger, spanContext: SpanContext): Logger {
  return logger.child({
    ot_trace_id: spanContext.traceId,
    ot_span_id: spanContext.spanId,
  });
}

/** ロガー未指定の shim が使う出力なしのロガー。 */
export const silentLogger: Logger = pino({ level: 'silent' });
