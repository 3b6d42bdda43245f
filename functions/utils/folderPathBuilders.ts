// ========================================
// FOLDER PATH BUILDERS - Case folder and local file naming
// ========================================

import { format, toZonedTime } from 'date-fns-tz';

export const UNKNOWN_SUSPECT = 'Unknown';

const UNSAFE_PATH_CHARS = /[\\/:*?"<>|\u0000-\u001f]/g;

/**
 * Sanitizes a name for use as a single path segment.
 * Removes invalid characters, then leading and trailing dots and whitespace.
 */
export function sanitizeName(name: string | null | undefined, fallback = UNKNOWN_SUSPECT): string {
  if (!name) return fallback;
  return name
    .replace(UNSAFE_PATH_CHARS, '')
    .replace(/\s+/g, ' ')
    .replace(/^[.\s]+|[.\s]+$/g, '') || fallback;
}

/**
 * Formats the processing date as yyyy-MM-dd in the given time zone
 */
export function formatProcessingDate(date: Date, timeZone: string): string {
  const zoned = toZonedTime(date, timeZone);
  return format(zoned, 'yyyy-MM-dd', { timeZone });
}

/**
 * `{suspect}_{yyyy-MM-dd}`; an empty suspect name becomes "Unknown"
 */
export function buildCaseFolderName(suspectName: string, processedAt: Date, timeZone: string): string {
  return `${sanitizeName(suspectName)}_${formatProcessingDate(processedAt, timeZone)}`;
}

export function buildCaseFolderPath(rootPath: string, folderName: string): string {
  const root = rootPath.replace(/^\/+|\/+$/g, '');
  return root ? `/${root}/${folderName}` : `/${folderName}`;
}

/**
 * Local file name for one fetched link: the prefix keeps concurrent
 * downloads of the same case from colliding.
 */
export function buildLocalFileName(filePrefix: string, originalName: string | null | undefined): string {
  return `${filePrefix}-${sanitizeName(originalName, 'download')}`;
}

function safeDecode(value: string): string | null {
  try {
    return decodeURIComponent(value);
  } catch {
    return null;
  }
}

/**
 * Picks a file name from a Content-Disposition header, falling back to the
 * last segment of the URL path.
 */
export function resolveDownloadName(url: string, contentDisposition?: string | null): string | null {
  if (contentDisposition) {
    const encoded = /filename\*\s*=\s*(?:UTF-8'')?([^;]+)/i.exec(contentDisposition);
    const decoded = encoded ? safeDecode(encoded[1].trim().replace(/^"|"$/g, '')) : null;
    if (decoded) return decoded;

    const plain = /filename\s*=\s*"?([^";]+)"?/i.exec(contentDisposition);
    if (plain) return plain[1].trim();
  }

  const segments = new URL(url).pathname.split('/').filter(Boolean);
  const last = segments[segments.length - 1];
  if (!last) return null;
  return safeDecode(last) ?? last;
}
