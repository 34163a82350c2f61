import nodeFs from 'node:fs/promises';
import { TextDecoder } from 'node:util';
import { describeFault, type DecodeErrorsMode } from '@treedump/shared';

export const OPAQUE_PLACEHOLDER = 'Content ignored due to file type or rules';
export const DECODE_ERROR_PLACEHOLDER = 'Content ignored due to decoding error';
export const READ_ERROR_PREFIX = 'Content unavailable: ';

export function readErrorPlaceholder(reason: string): string {
  return `${READ_ERROR_PREFIX}${reason}`;
}

export type ContentStatus = 'text' | 'opaque' | 'decode-error' | 'read-error';

export interface FileContent {
  content: string;
  status: ContentStatus;
  /** Short fault description, set for `read-error` */
  reason?: string;
}

export interface ReadTextOptions {
  decodeErrors?: DecodeErrorsMode;
  readFile?: (path: string) => Promise<Buffer>;
}

const NUL = 0x00;

export function stripNullBytes(bytes: Uint8Array): Uint8Array {
  return bytes.includes(NUL) ? bytes.filter((b) => b !== NUL) : bytes;
}

/**
 * Decodes UTF-8. In `replace` mode invalid sequences become U+FFFD;
 * in `placeholder` mode they yield `undefined`.
 */
export function decodeText(bytes: Uint8Array, mode: DecodeErrorsMode = 'replace'): string | undefined {
  const decoder = new TextDecoder('utf-8', { fatal: mode === 'placeholder', ignoreBOM: true });
  try {
    return decoder.decode(bytes);
  } catch (error) {
    if (error instanceof TypeError) {
      return undefined;
    }
    throw error;
  }
}

/**
 * Reads a text file. Never rejects: I/O faults come back as a `read-error` placeholder.
 */
export async function readText(absPath: string, options: ReadTextOptions = {}): Promise<FileContent> {
  const readFile = options.readFile ?? ((p: string) => nodeFs.readFile(p));

  let bytes: Uint8Array;
  try {
    bytes = await readFile(absPath);
  } catch (error) {
    const reason = describeFault(error);
    return { content: readErrorPlaceholder(reason), status: 'read-error', reason };
  }

  const text = decodeText(stripNullBytes(bytes), options.decodeErrors);
  if (text === undefined) {
    return { content: DECODE_ERROR_PLACEHOLDER, status: 'decode-error' };
  }
  return { content: text, status: 'text' };
}
