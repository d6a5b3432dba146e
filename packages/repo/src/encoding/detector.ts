import { DEFAULT_FALLBACK_ENCODINGS, DEFAULT_MAX_FILE_SIZE_BYTES } from '@codepack/shared';

export interface DetectOptions {
  /** Larger inputs are reported as binary without decoding. Default 1 MiB. */
  maxBytes?: number;
  /** Tried in order after strict UTF-8 fails. WHATWG encoding labels. */
  fallbackEncodings?: readonly string[];
}

export type BinaryReason = 'too-large' | 'binary-content' | 'undecodable';

export type EncodingDetection =
  | { readonly isBinary: false; readonly encoding: string; readonly text: string }
  | { readonly isBinary: true; readonly encoding: 'binary'; readonly reason: BinaryReason };

/** Bytes inspected by the binary heuristic. */
export const SNIFF_BYTES = 8 * 1024;
/** Share of control bytes above which a sample counts as binary. */
export const NON_PRINTABLE_THRESHOLD = 0.3;

const MULTIBYTE = new Set(['shift_jis', 'euc-jp', 'iso-2022-jp', 'gb18030', 'gbk', 'big5', 'euc-kr']);
const MIN_MULTIBYTE_CHARS = 4;

const BOMS: ReadonlyArray<{ bytes: readonly number[]; label: string; decoder: string }> = [
  { bytes: [0xef, 0xbb, 0xbf], label: 'utf-8-bom', decoder: 'utf-8' },
  { bytes: [0xff, 0xfe], label: 'utf-16le', decoder: 'utf-16le' },
  { bytes: [0xfe, 0xff], label: 'utf-16be', decoder: 'utf-16be' },
];

/**
 * True if `label` names an encoding this runtime's TextDecoder supports.
 */
export function isSupportedEncoding(label: string): boolean {
  try {
    new TextDecoder(label);
    return true;
  } catch {
    return false;
  }
}

function startsWith(bytes: Uint8Array, prefix: readonly number[]): boolean {
  return prefix.length <= bytes.length && prefix.every((b, i) => bytes[i] === b);
}

function isControl(byte: number): boolean {
  // Tab, LF, VT, FF, CR are text.
  return (byte < 0x20 && (byte < 0x09 || byte > 0x0d)) || byte === 0x7f;
}

/**
 * NUL bytes, or too many other control bytes, in the leading sample.
 */
export function looksBinary(bytes: Uint8Array): boolean {
  const sample = bytes.subarray(0, SNIFF_BYTES);
  if (sample.length === 0) return false;
  let control = 0;
  for (const byte of sample) {
    if (byte === 0) return true;
    if (isControl(byte)) control++;
  }
  return control / sample.length > NON_PRINTABLE_THRESHOLD;
}

function decodeStrict(bytes: Uint8Array, label: string): { text: string; encoding: string } | undefined {
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(label, { fatal: true });
  } catch {
    // Unsupported label.
    return undefined;
  }
  try {
    return { text: decoder.decode(bytes), encoding: decoder.encoding };
  } catch {
    return undefined;
  }
}

/**
 * Rejects decodes that succeeded only by accident: replacement or
 * private-use characters, C1 controls, a handful of stray CJK characters,
 * or Latin-1 bytes read as halfwidth katakana.
 */
export function isPlausible(text: string, encoding: string): boolean {
  let nonAscii = 0;
  let halfwidthKana = 0;
  for (const ch of text) {
    const cp = ch.codePointAt(0) ?? 0;
    if (cp < 0x80) continue;
    nonAscii++;
    if (cp === 0xfffd) return false;
    if (cp <= 0x9f) return false;
    if (cp >= 0xe000 && cp <= 0xf8ff) return false;
    if (cp >= 0xff61 && cp <= 0xff9f) halfwidthKana++;
  }
  if (MULTIBYTE.has(encoding)) {
    if (nonAscii < MIN_MULTIBYTE_CHARS) return false;
    if (halfwidthKana * 2 >= nonAscii) return false;
  }
  return true;
}

/**
 * Decides how to read a file's bytes.
 *
 * Order: size ceiling, byte-order mark, binary heuristic, strict UTF-8, then
 * each fallback encoding that yields plausible text. When nothing fits the
 * result is binary with reason `undecodable`.
 */
export function detect(bytes: Uint8Array, options: DetectOptions = {}): EncodingDetection {
  const maxBytes = options.maxBytes ?? DEFAULT_MAX_FILE_SIZE_BYTES;
  if (bytes.byteLength > maxBytes) {
    return { isBinary: true, encoding: 'binary', reason: 'too-large' };
  }

  for (const bom of BOMS) {
    if (startsWith(bytes, bom.bytes)) {
      const decoded = decodeStrict(bytes.subarray(bom.bytes.length), bom.decoder);
      if (decoded) return { isBinary: false, encoding: bom.label, text: decoded.text };
      break;
    }
  }

  if (looksBinary(bytes)) {
    return { isBinary: true, encoding: 'binary', reason: 'binary-content' };
  }

  const utf8 = decodeStrict(bytes, 'utf-8');
  if (utf8) return { isBinary: false, encoding: utf8.encoding, text: utf8.text };

  for (const label of options.fallbackEncodings ?? DEFAULT_FALLBACK_ENCODINGS) {
    const decoded = decodeStrict(bytes, label);
    if (decoded && isPlausible(decoded.text, decoded.encoding)) {
      return { isBinary: false, encoding: decoded.encoding, text: decoded.text };
    }
  }

  return { isBinary: true, encoding: 'binary', reason: 'undecodable' };
}
