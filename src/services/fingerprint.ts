// src/services/fingerprint.ts
// What: Content fingerprints for duplicate detection.
// How: Normalizes text (NFC, control characters stripped, whitespace runs collapsed, trimmed, lowercased)
//      and hashes it with SHA-256. Not used for anything security-relevant.

import { createHash } from 'crypto';

// C0/C1 controls except tab, newline, vertical tab, form feed and carriage return, which count as whitespace.
const CONTROL_CHARS = /[\u0000-\u0008\u000e-\u001f\u007f-\u009f]/g;

export function normalizeContent(text: string): string {
  return text.normalize('NFC').replace(CONTROL_CHARS, '').replace(/\s+/g, ' ').trim().toLowerCase();
}

export function fingerprint(text: string): string {
  return createHash('sha256').update(normalizeContent(text), 'utf8').digest('hex');
}
