/**
 * HTTP tests for the Express app
 * The server listens on an ephemeral port; the renderer and remote downloads are faked
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { Server } from 'http';
import { createApp } from '../src/app';
import { loadConfig } from '../src/config';
import { createOrchestrator } from '../src/services/ConversionOrchestrator';
import { BoundedFetcher, FetchFn } from '../src/services/BoundedFetcher';
import { HtmlRenderer } from '../src/services/PdfRenderer';
import { TempFileStore } from '../src/services/TempFileStore';
import { ExternalToolError } from '../src/errors';

const REMOTE_HTML = '<html><head><title></title></head><body><h1>Hello</h1>\n\n\n<p>World</p></body></html>';

describe('HTTP API', () => {
  let tmpDir: string;
  let server: Server;
  let baseUrl: string;
  let store: TempFileStore;
  let renderer: jest.Mocked<HtmlRenderer>;
  let fetchImpl: jest.Mock<Promise<Response>, Parameters<FetchFn>>;

  beforeAll(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'api-test-'));
    const config = loadConfig({}, { tmpDir, maxUploadBytes: 1024 });
    store = new TempFileStore({ baseDir: tmpDir, prefix: config.tmpPrefix });
    renderer = { render: jest.fn() };
    fetchImpl = jest.fn<Promise<Response>, Parameters<FetchFn>>();

    const orchestrator = createOrchestrator(config, {
      renderer,
      fetcher: new BoundedFetcher({ fetchImpl })
    });
    const app = createApp({ config, orchestrator });

    await new Promise<void>(resolve => {
      server = app.listen(0, () => resolve());
    });
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Expected a TCP address');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>(resolve => server.close(() => resolve()));
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  beforeEach(() => {
    jest.clearAllMocks();
  });

  function postJson(route: string, body: unknown): Promise<Response> {
    return fetch(`${baseUrl}${route}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body)
    });
  }

  function upload(contents: string, filename: string, query = ''): Promise<Response> {
    const form = new FormData();
    form.append('file', new Blob([contents]), filename);
    return fetch(`${baseUrl}/convert${query}`, { method: 'POST', body: form });
  }

  describe('GET /health', () => {
    test('should report the service status', async () => {
      const response = await fetch(`${baseUrl}/health`);
      const body = await response.json();

      expect(response.status).toBe(200);
      expect(body.status).toBe('ok');
      expect(body.service).toBe('document-conversion');
      expect(new Date(body.timestamp).toISOString()).toBe(body.timestamp);
    });
  });

  describe('POST /html-to-pdf', () => {
    test('should return the PDF as an attachment', async () => {
      renderer.render.mockResolvedValue(Buffer.from('%PDF-1.4 test'));

      const response = await postJson('/html-to-pdf', { html: '<h1>Invoice</h1>' });

      expect(response.status).toBe(200);
      expect(response.headers.get('content-type')).toBe('application/pdf');
      expect(response.headers.get('content-disposition')).toBe('attachment; filename="document.pdf"');
      expect(response.headers.get('content-length')).toBe('13');
      expect(Buffer.from(await response.arrayBuffer()).toString()).toBe('%PDF-1.4 test');
    });

    test('should reject a missing html field', async () => {
      const response = await postJson('/html-to-pdf', {});

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        success: false,
        error: { code: 'INVALID_REQUEST', message: 'Missing or invalid HTML content' }
      });
      expect(renderer.render).not.toHaveBeenCalled();
    });

    test('should report renderer failures as 500', async () => {
      renderer.render.mockRejectedValue(new ExternalToolError('wkhtmltopdf', 'exited with code 1', 'boom'));

      const response = await postJson('/html-to-pdf', { html: '<p>x</p>' });

      expect(response.status).toBe(500);
      expect(await response.json()).toEqual({
        success: false,
        error: { code: 'RENDERING_FAILED', message: 'conversion failed: wkhtmltopdf: exited with code 1: boom' }
      });
    });

    test('should reject malformed JSON', async () => {
      const response = await fetch(`${baseUrl}/html-to-pdf`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{"html": '
      });

      expect(response.status).toBe(400);
      const body = await response.json();
      expect(body.success).toBe(false);
      expect(body.error.code).toBe('INVALID_REQUEST');
    });
  });

  describe('POST /docling/url-to-markdown', () => {
    test('should convert a remote HTML page to Markdown', async () => {
      fetchImpl.mockResolvedValue(
        new Response(REMOTE_HTML, { headers: { 'content-type': 'text/html; charset=utf-8' } })
      );

      const response = await postJson('/docling/url-to-markdown', { url: 'https://example.com/page' });

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ url: 'https://example.com/page', markdown: '# Hello\n\nWorld' });
      expect(await store.count()).toBe(0);
    });

    test('should accept the snake_case limit aliases', async () => {
      fetchImpl.mockResolvedValue(new Response(REMOTE_HTML, { headers: { 'content-type': 'text/html' } }));

      const response = await postJson('/docling/url-to-markdown', {
        url: 'https://example.com/page.html',
        max_mb: '2',
        timeout_s: 5
      });

      expect(response.status).toBe(200);
    });

    test('should reject a non-numeric size cap', async () => {
      const response = await postJson('/docling/url-to-markdown', { url: 'https://example.com/a.pdf', maxMb: 'lots' });

      expect(response.status).toBe(400);
      expect((await response.json()).error.message).toBe('maxMb must be a positive integer');
      expect(fetchImpl).not.toHaveBeenCalled();
    });

    test('should report upstream failures as 500', async () => {
      fetchImpl.mockResolvedValue(new Response('gone', { status: 404 }));

      const response = await postJson('/docling/url-to-markdown', { url: 'https://example.com/missing.pdf' });

      expect(response.status).toBe(500);
      expect(await response.json()).toEqual({
        success: false,
        error: {
          code: 'FETCH_FAILED',
          message: 'conversion failed: download of https://example.com/missing.pdf failed with HTTP 404'
        }
      });
      expect(await store.count()).toBe(0);
    });
  });

  describe('POST /convert', () => {
    test('should default to Markdown', async () => {
      const response = await upload('<p>Hello</p><p>World</p>', 'page.html');

      expect(response.status).toBe(200);
      expect(response.headers.get('content-type')).toBe('text/plain; charset=utf-8');
      expect(await response.text()).toBe('Hello\n\nWorld');
    });

    test('should honour the outputFormat query parameter', async () => {
      const response = await upload('<h2>Hello</h2><p>World</p>', 'page.html', '?outputFormat=html');
      const html = await response.text();

      expect(response.status).toBe(200);
      expect(response.headers.get('content-type')).toBe('text/html; charset=utf-8');
      expect(html).toContain('<h2>Hello</h2>\n<p>World</p>');
    });

    test('should read outputFormat from the form fields', async () => {
      const form = new FormData();
      form.append('outputFormat', 'json');
      form.append('file', new Blob(['Plain notes']), 'notes.txt');

      const response = await fetch(`${baseUrl}/convert`, { method: 'POST', body: form });
      const body = await response.json();

      expect(response.status).toBe(200);
      expect(body.source).toBe('text');
      expect(body.nodes).toEqual([{ kind: 'paragraph', text: 'Plain notes' }]);
    });

    test('should reject an unsupported format', async () => {
      const response = await upload('x', 'a.txt', '?outputFormat=docx');

      expect(response.status).toBe(400);
      expect((await response.json()).error.code).toBe('UNSUPPORTED_FORMAT');
    });

    test('should reject a request without a file', async () => {
      const form = new FormData();
      form.append('outputFormat', 'text');

      const response = await fetch(`${baseUrl}/convert`, { method: 'POST', body: form });

      expect(response.status).toBe(400);
      expect((await response.json()).error.message).toBe('No file uploaded (expected multipart field "file")');
    });

    test('should reject uploads above the size limit', async () => {
      const response = await upload('a'.repeat(2000), 'big.txt');

      expect(response.status).toBe(413);
      expect((await response.json()).error).toEqual({
        code: 'PAYLOAD_TOO_LARGE',
        message: 'Uploaded file exceeds the size limit'
      });
    });

    test('should report unreadable documents as 400 and clean up', async () => {
      const response = await upload('PK\u0003\u0004broken archive', 'broken.docx');

      expect(response.status).toBe(400);
      expect((await response.json()).error.code).toBe('CONVERSION_FAILED');
      expect(await store.count()).toBe(0);
    });
  });
});
