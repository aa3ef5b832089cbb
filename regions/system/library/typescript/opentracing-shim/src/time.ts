import type { HrTime } from '@opentelemetry/api';
import { millisToHrTime } from '@opentelemetry/core';

/**
 * toHrTime は OpenTracing のタイムスタンプ (epoch ミリ秒) を OpenTelemetry の HrTime に変換する。
 * 指定なし、または有限数でない場合は undefined を返し、呼び出し側は SDK の現在時刻を使う。
 */
export function toHrTime(millis: number | undefined): HrTime | undefined {
  if (millis === undefined || !Number.isFinite(millis)) {
    return undefined;
  }
  return millisToHrTime(millis);
}
