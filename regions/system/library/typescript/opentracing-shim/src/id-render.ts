/**
 * toLowerBase16 は固定長のバイナリ ID を区切り・接頭辞なしの小文字 16 進文字列に変換する。
 * 出力長は常に byteLength の 2 倍。
 */
export function toLowerBase16(id: Uint8Array): string {
  return Buffer.from(id.buffer, id.byteOffset, id.byteLength).toString('hex');
}

/**
 * renderId はトレース ID / スパン ID を正規形の文字列にする。
 * @opentelemetry/api は ID を 16 進文字列で保持するため、文字列は小文字化のみ行う。
 */
export function renderId(id: string | Uint8Array): string {
  return typeof id === 'string' ? id.toLowerCase() : toLowerBase16(id);
}
