import { Tags } from 'opentracing';
import {
  ATTR_EXCEPTION_MESSAGE,
  ATTR_EXCEPTION_STACKTRACE,
  ATTR_EXCEPTION_TYPE,
} from '@opentelemetry/semantic-conventions';

/** OpenTracing の予約タグ名。status へマッピングされる。 */
export const ERROR_TAG = Tags.ERROR;

/** log フィールドのうちイベント名を指定するキー。 */
export const EVENT_FIELD = 'event';

/** event フィールドが無い場合のイベント名。 */
export const DEFAULT_EVENT_NAME = 'log';

/** event=error のログを変換した後のイベント名。 */
export const EXCEPTION_EVENT_NAME = 'exception';

export const ERROR_TAG_TRUE = 'true';
export const ERROR_TAG_FALSE = 'false';

/**
 * event=error のときに書き換える log フィールドのキー。
 * 値は OpenTelemetry の exception セマンティック規約のキー。
 */
export const EXCEPTION_FIELD_KEYS: ReadonlyMap<string, string> = new Map([
  ['error.kind', ATTR_EXCEPTION_TYPE],
  ['message', ATTR_EXCEPTION_MESSAGE],
  ['stack', ATTR_EXCEPTION_STACKTRACE],
]);
