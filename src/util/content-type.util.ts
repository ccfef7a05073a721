/**
 * Content Type Utilities
 *
 * Extension lookup through the mime-types database, with signature-based
 * sniffing of the first bytes as the fallback for unknown extensions.
 */

import { contentType } from 'mime-types';
import type { TemplateFile } from '../type/fs.type.ts';

/** Maximum number of bytes considered when sniffing. */
export const SNIFF_LENGTH = 512;

export const OCTET_STREAM = 'application/octet-stream';
export const TEXT_PLAIN = 'text/plain; charset=utf-8';
export const TEXT_HTML = 'text/html; charset=utf-8';

/** Content type for a file extension (`.css`), or undefined when unknown. */
export function contentTypeByExtension(ext: string): string | undefined {
  if (!ext) return undefined;
  return contentType(ext) || undefined;
}

// ── Signatures ─────────────────────────────────────────────────────────

interface Signature {
  readonly type: string;
  match(data: Uint8Array, firstNonWs: number): boolean;
}

function toBytes(s: string): number[] {
  return Array.from(s, (c) => c.charCodeAt(0));
}

function startsWith(data: Uint8Array, at: number, expected: readonly (number | null)[]): boolean {
  if (data.length - at < expected.length) return false;
  return expected.every((b, i) => b === null || data[at + i] === b);
}

/** Exact byte prefix. */
function exact(prefix: string, type: string): Signature {
  const bytes = toBytes(prefix);
  return { type, match: (data) => startsWith(data, 0, bytes) };
}

/** Prefix with wildcard runs: strings match literally, numbers skip that many bytes. */
function masked(parts: readonly (string | number)[], type: string): Signature {
  const bytes = parts.flatMap((p) => (typeof p === 'number' ? Array<null>(p).fill(null) : toBytes(p)));
  return { type, match: (data) => startsWith(data, 0, bytes) };
}

/** Markup prefix, after leading whitespace, matched case-insensitively. */
function markup(tag: string, type: string, terminated: boolean): Signature {
  const upper = toBytes(tag.toUpperCase());
  return {
    type,
    match(data, firstNonWs) {
      if (data.length - firstNonWs < upper.length + (terminated ? 1 : 0)) return false;
      for (let i = 0; i < upper.length; i++) {
        let b = data[firstNonWs + i];
        if (b >= 0x61 && b <= 0x7a) b -= 0x20;
        if (b !== upper[i]) return false;
      }
      if (!terminated) return true;
      const next = data[firstNonWs + upper.length];
      return next === 0x20 || next === 0x3e;
    },
  };
}

const html = (tag: string) => markup(tag, TEXT_HTML, true);

/** ISO base media file with an `mp4` brand in its `ftyp` box. */
const mp4: Signature = {
  type: 'video/mp4',
  match(data) {
    if (data.length < 12) return false;
    const boxSize = new DataView(data.buffer, data.byteOffset, 4).getUint32(0);
    if (data.length < boxSize || boxSize % 4 !== 0) return false;
    if (!startsWith(data, 4, toBytes('ftyp'))) return false;
    for (let at = 8; at < boxSize; at += 4) {
      if (at === 12) continue; // minor version
      if (startsWith(data, at, toBytes('mp4'))) return true;
    }
    return false;
  },
};

const SIGNATURES: readonly Signature[] = [
  html('<!DOCTYPE HTML'),
  html('<HTML'),
  html('<HEAD'),
  html('<SCRIPT'),
  html('<IFRAME'),
  html('<H1'),
  html('<DIV'),
  html('<FONT'),
  html('<TABLE'),
  html('<A'),
  html('<STYLE'),
  html('<TITLE'),
  html('<B'),
  html('<BODY'),
  html('<BR'),
  html('<P'),
  html('<!--'),
  markup('<?xml', 'text/xml; charset=utf-8', false),
  exact('%PDF-', 'application/pdf'),
  exact('%!PS-Adobe-', 'application/postscript'),
  exact('\xfe\xff', 'text/plain; charset=utf-16be'),
  exact('\xff\xfe', 'text/plain; charset=utf-16le'),
  exact('\xef\xbb\xbf', TEXT_PLAIN),
  exact('\x00\x00\x01\x00', 'image/x-icon'),
  exact('\x00\x00\x02\x00', 'image/x-icon'),
  exact('BM', 'image/bmp'),
  exact('GIF87a', 'image/gif'),
  exact('GIF89a', 'image/gif'),
  masked(['RIFF', 4, 'WEBPVP'], 'image/webp'),
  exact('\x89PNG\r\n\x1a\n', 'image/png'),
  exact('\xff\xd8\xff', 'image/jpeg'),
  masked(['FORM', 4, 'AIFF'], 'audio/aiff'),
  exact('ID3', 'audio/mpeg'),
  exact('OggS\x00', 'application/ogg'),
  exact('MThd\x00\x00\x00\x06', 'audio/midi'),
  masked(['RIFF', 4, 'AVI '], 'video/avi'),
  masked(['RIFF', 4, 'WAVE'], 'audio/wave'),
  mp4,
  exact('\x1a\x45\xdf\xa3', 'video/webm'),
  exact('\x00\x01\x00\x00', 'font/ttf'),
  exact('OTTO', 'font/otf'),
  exact('ttcf', 'font/collection'),
  exact('wOFF', 'font/woff'),
  exact('wOF2', 'font/woff2'),
  exact('\x1f\x8b\x08', 'application/x-gzip'),
  exact('PK\x03\x04', 'application/zip'),
  exact('Rar!\x1a\x07\x00', 'application/x-rar-compressed'),
  exact('Rar!\x1a\x07\x01\x00', 'application/x-rar-compressed'),
  exact('\x00asm', 'application/wasm'),
];

function isWhitespace(b: number): boolean {
  return b === 0x09 || b === 0x0a || b === 0x0c || b === 0x0d || b === 0x20;
}

function isBinary(b: number): boolean {
  return b <= 0x08 || b === 0x0b || (b >= 0x0e && b <= 0x1a) || (b >= 0x1c && b <= 0x1f);
}

/**
 * Detect a content type from the first bytes of a file.
 * Only the first SNIFF_LENGTH bytes are considered. Always returns a type.
 */
export function detectContentType(bytes: Uint8Array): string {
  const data = bytes.subarray(0, SNIFF_LENGTH);

  let firstNonWs = 0;
  while (firstNonWs < data.length && isWhitespace(data[firstNonWs])) firstNonWs++;

  for (const sig of SIGNATURES) {
    if (sig.match(data, firstNonWs)) return sig.type;
  }

  for (let i = firstNonWs; i < data.length; i++) {
    if (isBinary(data[i])) return OCTET_STREAM;
  }
  return TEXT_PLAIN;
}

// ── File sniffing ──────────────────────────────────────────────────────

/**
 * Read up to `size` bytes, looping until the buffer is full or a read
 * returns zero bytes. Read errors propagate.
 */
export async function readPrefix(file: TemplateFile, size = SNIFF_LENGTH): Promise<Uint8Array> {
  const buf = new Uint8Array(size);
  let total = 0;
  while (total < size) {
    const n = await file.read(buf.subarray(total));
    if (n === 0) break;
    total += n;
  }
  return buf.subarray(0, total);
}

export interface SniffedContent {
  contentType: string;
  /** Bytes already consumed from the file; they must be emitted first. */
  prefix: Uint8Array;
}

/**
 * Content type for an open file. The extension wins when it is known;
 * otherwise a prefix is read and sniffed.
 */
export async function resolveContentType(file: TemplateFile, ext: string): Promise<SniffedContent> {
  const byExtension = contentTypeByExtension(ext);
  if (byExtension) return { contentType: byExtension, prefix: new Uint8Array(0) };

  const prefix = await readPrefix(file);
  return { contentType: detectContentType(prefix), prefix };
}
