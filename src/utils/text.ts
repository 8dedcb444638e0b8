/**
 * Byte and text helpers for values reported by udev and command output
 */

import { TextDecoder } from 'util';
import { ConfigurationError } from '../errors/index.js';

const UDEV_ESCAPE = /\\x([0-9a-fA-F]{2})/g;

/**
 * Undo udev's \xNN escaping (as used by ID_MODEL_ENC, ID_FS_LABEL_ENC and
 * ID_PART_ENTRY_NAME), keeping the result as bytes.
 */
export function unescapeUdev(raw: Buffer): Buffer {
  const text = raw.toString('latin1').replace(UDEV_ESCAPE, (_match, hex: string) =>
    String.fromCharCode(parseInt(hex, 16))
  );
  return Buffer.from(text, 'latin1');
}

/**
 * Decode bytes in fatal mode: invalid sequences throw instead of being replaced
 */
export function decodeText(bytes: Buffer, encoding: string): string {
  return new TextDecoder(encoding, { fatal: true }).decode(bytes);
}

export function isSupportedEncoding(encoding: string): boolean {
  try {
    new TextDecoder(encoding);
    return true;
  } catch {
    return false;
  }
}

/**
 * Charset named by the process locale (LC_ALL, LC_CTYPE, then LANG).
 * Locales without a usable charset fall back to utf-8.
 */
export function localeEncoding(env: NodeJS.ProcessEnv = process.env): string {
  const locale = env['LC_ALL'] || env['LC_CTYPE'] || env['LANG'] || '';
  const charset = /^[^.]*\.([^@]+)/.exec(locale)?.[1]?.toLowerCase();
  if (!charset) {
    return 'utf-8';
  }
  const normalized = charset === 'utf8' ? 'utf-8' : charset;
  return isSupportedEncoding(normalized) ? normalized : 'utf-8';
}

/**
 * Pick the encoding for free-text fields: the configured one, or the locale's
 */
export function resolveEncoding(configured?: string, env: NodeJS.ProcessEnv = process.env): string {
  if (configured === undefined) {
    return localeEncoding(env);
  }
  if (!isSupportedEncoding(configured)) {
    throw new ConfigurationError(`Unsupported text encoding: ${configured}`, {
      encoding: configured,
    });
  }
  return configured;
}
