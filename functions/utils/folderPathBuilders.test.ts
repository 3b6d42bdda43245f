import { describe, it, expect } from 'vitest';

import {
  buildCaseFolderName,
  buildCaseFolderPath,
  buildLocalFileName,
  formatProcessingDate,
  resolveDownloadName,
  sanitizeName,
} from './folderPathBuilders.js';

describe('sanitizeName', () => {
  it('should strip path characters, collapse whitespace and leading dots', () => {
    expect(sanitizeName('  ../Jo/hn: "Doe"  ')).toBe('John Doe');
  });

  it('should strip dots and spaces at both ends but keep inner dots', () => {
    expect(sanitizeName('. . x')).toBe('x');
    expect(sanitizeName('Report v1.2. ')).toBe('Report v1.2');
    expect(sanitizeName(' . ')).toBe('Unknown');
  });

  it('should fall back when nothing usable is left', () => {
    expect(sanitizeName('')).toBe('Unknown');
    expect(sanitizeName('///')).toBe('Unknown');
    expect(sanitizeName(null, 'download')).toBe('download');
  });
});

describe('case folder naming', () => {
  it('should format the processing date in the configured time zone', () => {
    const at = new Date('2024-01-01T03:00:00Z');

    expect(formatProcessingDate(at, 'UTC')).toBe('2024-01-01');
    expect(formatProcessingDate(at, 'America/New_York')).toBe('2023-12-31');
  });

  it('should name the folder after the suspect and date', () => {
    const at = new Date('2024-05-06T12:00:00Z');

    expect(buildCaseFolderName('Jane Roe', at, 'UTC')).toBe('Jane Roe_2024-05-06');
    expect(buildCaseFolderName('  ', at, 'UTC')).toBe('Unknown_2024-05-06');
  });

  it('should join the folder under the root with single slashes', () => {
    expect(buildCaseFolderPath('/Evidence/', 'Jane Roe_2024-05-06')).toBe('/Evidence/Jane Roe_2024-05-06');
    expect(buildCaseFolderPath('', 'X')).toBe('/X');
    expect(buildCaseFolderPath('/', 'X')).toBe('/X');
  });
});

describe('local file naming', () => {
  it('should prefix names and fall back to "download"', () => {
    expect(buildLocalFileName('link-01', null)).toBe('link-01-download');
    expect(buildLocalFileName('link-02', 'a/b.zip')).toBe('link-02-ab.zip');
  });

  it('should prefer the extended filename from Content-Disposition', () => {
    expect(
      resolveDownloadName(
        'https://files.example.com/get?id=1',
        "attachment; filename=fallback.bin; filename*=UTF-8''r%C3%A9sum%C3%A9.pdf",
      ),
    ).toBe('résumé.pdf');
  });

  it('should read a quoted plain filename', () => {
    expect(resolveDownloadName('https://files.example.com/get', 'attachment; filename="evidence.zip"')).toBe(
      'evidence.zip',
    );
  });

  it('should fall back to the decoded last path segment', () => {
    expect(resolveDownloadName('https://files.example.com/files/report%20final.pdf')).toBe('report final.pdf');
    expect(resolveDownloadName('https://files.example.com/')).toBeNull();
  });
});
