import { describe, expect, it } from 'vitest';
import { detectFileType, sanitizeFilename, toIncomingFile } from '../../../src/services/uploads.js';

describe('sanitizeFilename', () => {
  it('strips path components of either style', () => {
    expect(sanitizeFilename('../../etc/passwd')).toBe('passwd');
    expect(sanitizeFilename('C:\\Users\\me\\notes.txt')).toBe('notes.txt');
  });

  it('replaces reserved characters and falls back for empty names', () => {
    expect(sanitizeFilename('a<b>:c?.txt')).toBe('a_b__c_.txt');
    expect(sanitizeFilename('..')).toBe('upload');
    expect(sanitizeFilename('   ')).toBe('upload');
  });

  it('truncates long names but keeps the extension', () => {
    const out = sanitizeFilename(`${'x'.repeat(250)}.pdf`);
    expect(out).toBe(`${'x'.repeat(196)}.pdf`);
  });
});

describe('detectFileType', () => {
  it('uses the extension first', () => {
    expect(detectFileType('Report.PDF')).toBe('PDF');
    expect(detectFileType('notes.text', 'application/pdf')).toBe('TXT');
    expect(detectFileType('memo.docx')).toBe('DOCX');
  });

  it('falls back to the declared mimetype', () => {
    expect(detectFileType('README', 'text/plain; charset=utf-8')).toBe('TXT');
    expect(detectFileType('blob', 'application/pdf')).toBe('PDF');
  });

  it('returns null for anything else', () => {
    expect(detectFileType('photo.png', 'image/png')).toBeNull();
    expect(detectFileType('legacy.doc', 'application/msword')).toBeNull();
    expect(detectFileType('constructor')).toBeNull();
  });
});

describe('toIncomingFile', () => {
  it('sanitizes the name and keeps the bytes', () => {
    const bytes = Buffer.from('hi');
    expect(toIncomingFile('dir/a.txt', bytes, 'TXT')).toEqual({ filename: 'a.txt', bytes, file_type: 'TXT' });
  });
});
