import path from 'node:path';
import isBinaryPath from 'is-binary-path';
import type { OpaqueConfig } from '@treedump/shared';

/**
 * Extensions treated as opaque on top of the `is-binary-path` list
 * (vector images, design files, fonts and logs).
 */
export const EXTRA_OPAQUE_EXTENSIONS: readonly string[] = [
  'svg',
  'log',
  'ai',
  'webp',
  'tiff',
  'ico',
  'eot',
  'ttf',
  'woff',
  'woff2',
];

/** Known non-source payloads that are listed but never read. */
export const OPAQUE_FILE_NAMES: readonly string[] = ['get-pip.py'];

export type OpaqueReason = 'extension' | 'file-name';

function normalizeExtension(ext: string): string {
  return ext.replace(/^\.+/, '').toLowerCase();
}

export class OpaqueFilePolicy {
  private readonly extensions: Set<string>;
  private readonly fileNames: Set<string>;

  constructor(extra: Partial<OpaqueConfig> = {}) {
    this.extensions = new Set(
      [...EXTRA_OPAQUE_EXTENSIONS, ...(extra.extensions ?? [])].map(normalizeExtension),
    );
    this.fileNames = new Set(
      [...OPAQUE_FILE_NAMES, ...(extra.fileNames ?? [])].map((n) => n.toLowerCase()),
    );
  }

  /**
   * Returns why a file's content must not be read, or `undefined` for text candidates.
   */
  reason(relativePath: string): OpaqueReason | undefined {
    const name = path.posix.basename(relativePath);
    const ext = normalizeExtension(path.posix.extname(name));
    if (isBinaryPath(name) || (ext && this.extensions.has(ext))) {
      return 'extension';
    }
    if (this.fileNames.has(name.toLowerCase())) {
      return 'file-name';
    }
    return undefined;
  }

  isOpaque(relativePath: string): boolean {
    return this.reason(relativePath) !== undefined;
  }
}
