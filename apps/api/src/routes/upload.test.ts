import fs from 'fs';
import path from 'path';
import { describe, it, expect, afterEach } from 'vitest';
import { body, createTestApp, registerAndLogin, type TestContext } from '../test/helpers';

const BOUNDARY = '----test-boundary';

function multipart(field: string, filename: string, content: string) {
  const payload = [
    `--${BOUNDARY}`,
    `Content-Disposition: form-data; name="${field}"; filename="${filename}"`,
    'Content-Type: image/png',
    '',
    content,
    `--${BOUNDARY}--`,
    '',
  ].join('\r\n');
  return {
    payload,
    headers: { 'content-type': `multipart/form-data; boundary=${BOUNDARY}` },
  };
}

describe('POST /api/upload', () => {
  let ctx: TestContext;

  afterEach(async () => {
    await ctx.close();
  });

  it('stores the file and serves it from the media URL', async () => {
    ctx = await createTestApp();
    const alice = await registerAndLogin(ctx.app, 'alice');
    const form = multipart('file', 'Photo.PNG', 'fake-image-bytes');

    const response = await ctx.app.inject({
      method: 'POST',
      url: '/api/upload/',
      headers: { ...alice.headers, ...form.headers },
      payload: form.payload,
    });
    const { url } = body<{ url: string }>(response).data;
    const pathname = new URL(url).pathname;
    const served = await ctx.app.inject({ method: 'GET', url: pathname });

    expect(body(response).message).toBe('Upload successful');
    expect(pathname).toMatch(/^\/media\/uploads\/[0-9a-f]{32}\.png$/);
    expect(fs.readFileSync(path.join(ctx.config.mediaRoot, 'uploads', path.basename(pathname)), 'utf8')).toBe(
      'fake-image-bytes'
    );
    expect(served.statusCode).toBe(200);
    expect(served.body).toBe('fake-image-bytes');
  });

  it('requires a file field', async () => {
    ctx = await createTestApp();
    const alice = await registerAndLogin(ctx.app, 'alice');
    const form = multipart('image', 'a.png', 'x');

    const wrongField = await ctx.app.inject({
      method: 'POST',
      url: '/api/upload',
      headers: { ...alice.headers, ...form.headers },
      payload: form.payload,
    });
    const json = await ctx.app.inject({
      method: 'POST',
      url: '/api/upload',
      headers: alice.headers,
      payload: { file: 'nope' },
    });

    expect(wrongField.statusCode).toBe(400);
    expect(body(wrongField).message).toBe('No file provided');
    expect(json.statusCode).toBe(400);
  });

  it('rejects files over the size limit', async () => {
    ctx = await createTestApp({ config: { uploadMaxBytes: 10 } });
    const alice = await registerAndLogin(ctx.app, 'alice');
    const form = multipart('file', 'big.png', 'x'.repeat(64));

    const response = await ctx.app.inject({
      method: 'POST',
      url: '/api/upload',
      headers: { ...alice.headers, ...form.headers },
      payload: form.payload,
    });

    expect(response.statusCode).toBe(413);
    expect(body(response)).toEqual({ code: 413, message: 'File is too large', data: null });
  });

  it('is closed to anonymous callers', async () => {
    ctx = await createTestApp();
    const form = multipart('file', 'a.png', 'x');

    const response = await ctx.app.inject({ method: 'POST', url: '/api/upload', ...form });

    expect(response.statusCode).toBe(401);
  });
});
