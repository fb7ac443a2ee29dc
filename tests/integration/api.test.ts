import type { Server } from 'http';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { createApp } from '../../src/app.js';
import { BROKEN_MARKER, P1, THREE_PARAGRAPHS, openServices, removeDir, tempDir } from '../helpers.js';

type Upload = [filename: string, content: string, type: string];

function multipart(field: string, uploads: Upload[]): FormData {
  const form = new FormData();
  for (const [filename, content, type] of uploads) {
    form.append(field, new Blob([content], { type }), filename);
  }
  return form;
}

const committed = z.object({ status: z.literal('committed'), doc_id: z.string() });
const created = z.object({ snapshot_id: z.string() });

describe('HTTP API', () => {
  let dir: string;
  let server: Server;
  let baseUrl: string;

  const post = (path: string, body: unknown) =>
    fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(body),
    });

  async function uploadNotes(): Promise<string> {
    const res = await fetch(`${baseUrl}/documents`, {
      method: 'POST',
      body: multipart('file', [['notes.txt', THREE_PARAGRAPHS, 'text/plain']]),
    });
    expect(res.status).toBe(201);
    return committed.parse(await res.json()).doc_id;
  }

  beforeEach(async () => {
    dir = await tempDir();
    const { manager, sessions } = await openServices(dir, 'flat');
    const app = createApp({ manager, sessions, uploadMaxBytes: 1024 });
    server = await new Promise<Server>((resolve) => {
      const s = app.listen(0, () => resolve(s));
    });
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('expected a TCP address');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    await removeDir(dir);
  });

  it('reports health with the active backend', async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok', backend: 'flat' });
  });

  it('ingests a document and answers 409 for the same content under another name', async () => {
    const docId = await uploadNotes();

    const again = await fetch(`${baseUrl}/documents`, {
      method: 'POST',
      body: multipart('file', [['copy.txt', THREE_PARAGRAPHS, 'text/plain']]),
    });

    expect(again.status).toBe(409);
    expect(await again.json()).toEqual({ status: 'duplicate', filename: 'copy.txt', existing_doc_id: docId });
  });

  it('refuses unsupported and oversized uploads', async () => {
    const png = await fetch(`${baseUrl}/documents`, {
      method: 'POST',
      body: multipart('file', [['photo.png', 'not really a png', 'image/png']]),
    });
    expect(png.status).toBe(415);
    expect(await png.json()).toEqual({
      error: {
        message: 'Unsupported file type for photo.png; expected PDF, TXT or DOCX',
        code: 'UNSUPPORTED_FILE_TYPE',
      },
    });

    const big = await fetch(`${baseUrl}/documents`, {
      method: 'POST',
      body: multipart('file', [['big.txt', 'word '.repeat(400), 'text/plain']]),
    });
    expect(big.status).toBe(413);
    expect(await big.json()).toMatchObject({ error: { code: 'LIMIT_FILE_SIZE' } });
  });

  it('answers 400 when no file is attached', async () => {
    const form = new FormData();
    form.append('note', 'no attachment');
    const res = await fetch(`${baseUrl}/documents`, { method: 'POST', body: form });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { message: 'No file provided (multipart field "file")', code: 'VALIDATION_ERROR' },
    });
  });

  it('returns ranked matches with their source', async () => {
    const docId = await uploadNotes();

    const res = await post('/query', { text: P1, k: 2 });
    expect(res.status).toBe(200);
    const body = z
      .object({
        query: z.string(),
        k: z.number(),
        matches: z.array(z.object({ chunk_id: z.string(), score: z.number() }).passthrough()),
      })
      .parse(await res.json());

    expect(body.k).toBe(2);
    expect(body.matches).toHaveLength(2);
    expect(body.matches[0]).toMatchObject({
      chunk_id: `${docId}:0`,
      chunk_text: P1,
      doc_id: docId,
      filename: 'notes.txt',
      file_type: 'TXT',
      source_offsets: { start: 0, end: 30 },
    });
    expect(body.matches[0].score).toBeCloseTo(1, 6);
  });

  it('validates request bodies', async () => {
    const blank = await post('/query', { text: '   ' });
    expect(blank.status).toBe(400);
    expect(await blank.json()).toMatchObject({ error: { code: 'VALIDATION_ERROR' } });

    const malformed = await fetch(`${baseUrl}/query`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: '{"text":',
    });
    expect(malformed.status).toBe(400);
    expect(await malformed.json()).toMatchObject({ error: { code: 'BAD_REQUEST' } });

    const badType = await fetch(`${baseUrl}/documents?type=exe`);
    expect(badType.status).toBe(400);
  });

  it('lists documents with filters and reports stats', async () => {
    const docId = await uploadNotes();

    const listed = await fetch(`${baseUrl}/documents?type=txt&search=NOTES`);
    expect(await listed.json()).toMatchObject({ count: 1, documents: [{ doc_id: docId, file_type: 'TXT' }] });

    const none = await fetch(`${baseUrl}/documents?type=pdf`);
    expect(await none.json()).toEqual({ count: 0, documents: [] });

    const stats = await fetch(`${baseUrl}/stats`);
    expect(await stats.json()).toEqual({
      doc_count: 1,
      chunk_count: 3,
      backend_type: 'flat',
      storage_bytes: expect.any(Number),
    });
  });

  it('runs health checks and reports when every probe fails', async () => {
    const empty = await post('/health-check', { probes: [P1] });
    expect(await empty.json()).toEqual({
      all_failed: true,
      results: [{ probe: P1, status: 'failed', top_score: null }],
    });

    await uploadNotes();
    const res = await post('/health-check', { probes: [P1] });
    expect(await res.json()).toMatchObject({ all_failed: false, results: [{ probe: P1, status: 'passed' }] });
  });

  it('removes documents and reports ids it does not know', async () => {
    const docId = await uploadNotes();

    const res = await post('/documents/remove', { doc_ids: [docId, 'ghost'] });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      removed: [docId],
      failed: [{ doc_id: 'ghost', reason: 'not_found' }],
      snapshot_id: expect.any(String),
    });
    expect((await post('/documents/remove', { doc_ids: [] })).status).toBe(400);
  });

  it('restores a labelled backup after a clear', async () => {
    const docId = await uploadNotes();
    const backup = await post('/backups', { label: 'before-clear' });
    expect(backup.status).toBe(201);
    const { snapshot_id } = created.parse(await backup.json());

    const cleared = await post('/documents/clear', {});
    expect(cleared.status).toBe(200);
    expect(await (await fetch(`${baseUrl}/documents`)).json()).toEqual({ count: 0, documents: [] });

    const restored = await post('/backups/restore', { snapshot: 'before-clear' });
    expect(restored.status).toBe(200);
    expect(await restored.json()).toMatchObject({ restored: true, snapshot_id });
    expect(await (await fetch(`${baseUrl}/documents`)).json()).toMatchObject({
      count: 1,
      documents: [{ doc_id: docId }],
    });

    const listed = await fetch(`${baseUrl}/backups`);
    expect(await listed.json()).toMatchObject({
      snapshots: expect.arrayContaining([expect.objectContaining({ label: 'before-clear' })]),
    });

    const missing = await post('/backups/restore', { snapshot: 'nope' });
    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({
      error: { message: 'Snapshot not found: nope', code: 'SNAPSHOT_NOT_FOUND' },
    });
  });

  it('replaces the store and reports files that failed', async () => {
    await uploadNotes();

    const res = await fetch(`${baseUrl}/documents/replace`, {
      method: 'POST',
      body: multipart('files', [
        ['fresh.txt', 'A brand new memo about lighthouses.', 'text/plain'],
        ['scan.pdf', `${BROKEN_MARKER} unreadable`, 'application/pdf'],
      ]),
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      snapshot_id: expect.any(String),
      ingested: [{ doc_id: expect.any(String), filename: 'fresh.txt', chunk_count: 1 }],
      duplicates: [],
      failed: [
        { filename: 'scan.pdf', code: 'EXTRACTION_ERROR', error: 'Could not extract text from scan.pdf: converter crashed' },
      ],
      skipped: [],
      cancelled: false,
    });
    expect(await (await fetch(`${baseUrl}/documents`)).json()).toMatchObject({
      count: 1,
      documents: [{ original_filename: 'fresh.txt' }],
    });
  });

  it('keeps per-session conversation history', async () => {
    const appended = await post('/sessions/s1/messages', { role: 'user', content: 'What did the memo say?' });
    expect(appended.status).toBe(201);

    const history = await fetch(`${baseUrl}/sessions/s1/messages`);
    expect(await history.json()).toEqual({
      session_id: 's1',
      messages: [{ role: 'user', content: 'What did the memo say?', at: expect.any(String) }],
    });

    const cleared = await fetch(`${baseUrl}/sessions/s1/messages`, { method: 'DELETE' });
    expect(cleared.status).toBe(204);
    expect(await (await fetch(`${baseUrl}/sessions/s1/messages`)).json()).toEqual({ session_id: 's1', messages: [] });
  });

  it('answers unknown routes with a JSON 404', async () => {
    const res = await fetch(`${baseUrl}/nowhere`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: { message: 'Not Found', code: 'NOT_FOUND' } });
  });
});
