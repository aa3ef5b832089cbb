import type { AttributeValue } from '@opentelemetry/api';

/**
 * LegacyValue は OpenTracing のタグ / log 値を分類した閉じた共用体。
 * 新しいケースを追加した場合、下の switch がコンパイルエラーになる。
 */
export type LegacyValue =
  | { kind: 'string'; value: string }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'integer'; value: number | bigint }
  | { kind: 'float'; value: number }
  | { kind: 'other'; value: unknown };

export function classifyValue(value: unknown): LegacyValue {
  switch (typeof value) {
    case 'string':
      return { kind: 'string', value };
    case 'boolean':
      return { kind: 'boolean', value };
    case 'bigint':
      return { kind: 'integer', value };
    case 'number':
      return Number.isInteger(value) ? { kind: 'integer', value } : { kind: 'float', value };
    default:
      return { kind: 'other', value };
  }
}

function assertNever(value: never): never {
  throw new TypeError(`unhandled legacy value: ${JSON.stringify(value)}`);
}

function integerAttribute(value: number | bigint): AttributeValue {
  if (typeof value === 'number') {
    return value;
  }
  if (value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)) {
    return Number(value);
  }
  return value.toString();
}

function renderOther(value: unknown): string {
  if (value === null || value === undefined) {
    return String(value);
  }
  if (typeof value === 'symbol' || typeof value === 'function') {
    return String(value);
  }
  if (value instanceof Error) {
    return `${value.name}: ${value.message}`;
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
  }
  try {
    return JSON.stringify(value) ?? fallbackString(value);
  } catch {
    // 循環参照など JSON にできない値
    return fallbackString(value);
  }
}

/** プロトタイプを持たないオブジェクトは String() も失敗するため toString タグに落とす。 */
function fallbackString(value: unknown): string {
  try {
    return String(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
}

/**
 * attributeFromValue は OpenTracing の値を OpenTelemetry の属性値に変換する。
 * 未対応の形は文字列表現に落とす。例外は送出しない。
 */
export function attributeFromValue(value: unknown): AttributeValue {
  const v = classifyValue(value);
  switch (v.kind) {
    case 'string':
    case 'boolean':
    case 'float':
      return v.value;
    case 'integer':
      return integerAttribute(v.value);
    case 'other':
      return renderOther(v.value);
    default:
      return assertNever(v);
  }
}

/**
 * stringFromValue は "true" / "false" との比較など判定用に値を文字列化する。
 */
export function stringFromValue(value: unknown): string {
  const v = classifyValue(value);
  switch (v.kind) {
    case 'string':
      return v.value;
    case 'boolean':
    case 'integer':
    case 'float':
      return v.value.toString();
    case 'other':
      return renderOther(v.value);
    default:
      return assertNever(v);
  }
}
