import * as fs from 'fs/promises';
import * as path from 'path';
import request from 'supertest';
import { CountersStore } from '../../storage/counters.store';
import { TEST_CARDS } from '../../testing/fixtures';
import { createTestApp, TestApp } from '../../testing/test-app';

describe('CardsController', () => {
  let ctx: TestApp;

  beforeEach(async () => {
    ctx = await createTestApp();
  });

  afterEach(async () => {
    await ctx.close();
  });

  it('redirects / to the default card', async () => {
    const res = await request(ctx.app.getHttpServer()).get('/');

    expect(res.status).toBe(302);
    expect(res.headers.location).toBe('/c/ada');
  });

  it('renders the card page', async () => {
    const res = await request(ctx.app.getHttpServer()).get('/c/ada');

    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toBe('text/html; charset=utf-8');
    expect(res.text).toContain('<h1>Ada Example</h1>');
    expect(res.text).toContain('href="/c/ada.vcf"');
    expect(res.text).toContain('href="/go/whatsapp/ada"');
    expect(res.text).toContain('href="tel:+27100000002"');
    expect(res.text).toContain('<img src="/qr/ada.png"');
  });

  it('escapes card values in the page', async () => {
    const res = await request(ctx.app.getHttpServer()).get('/c/grace');

    expect(res.status).toBe(200);
    expect(res.text).toContain('<p class="org">Sample &amp; Co</p>');
  });

  it('returns 404 for an unknown card page', async () => {
    const res = await request(ctx.app.getHttpServer()).get('/c/nobody');

    expect(res.status).toBe(404);
    expect(res.headers['content-type']).toBe('application/json; charset=utf-8');
    expect(res.body).toMatchObject({
      success: false,
      result: null,
      error: 'Card "nobody" not found',
      path: '/c/nobody',
    });
  });

  it('serves the vCard as a non-cacheable attachment and counts it', async () => {
    const res = await request(ctx.app.getHttpServer()).get('/c/ada.vcf');

    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toBe('text/vcard; charset=utf-8');
    expect(res.headers['content-disposition']).toBe(
      'attachment; filename="ada.vcf"',
    );
    expect(res.headers['cache-control']).toBe('no-store');
    expect(res.text.startsWith('BEGIN:VCARD\r\nVERSION:3.0\r\n')).toBe(true);
    expect(res.text.endsWith('END:VCARD\r\n')).toBe(true);

    const counters = await ctx.app.get(CountersStore).read('ada');
    expect(counters.contact_shared).toBe(1);
  });

  it('returns 404 for an unknown vCard without counting', async () => {
    const res = await request(ctx.app.getHttpServer()).get('/c/nobody.vcf');

    expect(res.status).toBe(404);
    await expect(ctx.app.get(CountersStore).readAll()).resolves.toEqual({});
  });

  it('answers a failed counter write with a plain JSON error', async () => {
    // A directory where the counters file should be makes every read fail
    await fs.mkdir(path.join(ctx.dataDir, 'counters.json'));

    const res = await request(ctx.app.getHttpServer()).get('/c/ada.vcf');

    expect(res.status).toBe(500);
    expect(res.headers['content-type']).toBe('application/json; charset=utf-8');
    expect(res.headers['content-disposition']).toBeUndefined();
    expect(res.body.error).toBe('Internal server error');
  });

  it('returns 500 when the cards file disappears after startup', async () => {
    await fs.rm(path.join(ctx.dataDir, 'cards.json'));

    const res = await request(ctx.app.getHttpServer()).get('/c/ada');

    expect(res.status).toBe(500);
    expect(res.body.error).toBe('Internal server error');
  });
});

describe('CardsController vCard filenames', () => {
  let ctx: TestApp;

  beforeEach(async () => {
    ctx = await createTestApp({
      cards: {
        ...TEST_CARDS,
        名刺: TEST_CARDS.grace,
        'a"b': TEST_CARDS.grace,
      },
    });
  });

  afterEach(async () => {
    await ctx.close();
  });

  it('encodes a non-ASCII slug in the attachment filename', async () => {
    const res = await request(ctx.app.getHttpServer()).get(
      `/c/${encodeURIComponent('名刺')}.vcf`,
    );

    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toBe('text/vcard; charset=utf-8');
    expect(res.headers['content-disposition']).toBe(
      `attachment; filename="??.vcf"; filename*=UTF-8''%E5%90%8D%E5%88%BA.vcf`,
    );
    expect((await ctx.app.get(CountersStore).read('名刺')).contact_shared).toBe(1);
  });

  it('quotes a slug containing a double quote', async () => {
    const res = await request(ctx.app.getHttpServer()).get('/c/a%22b.vcf');

    expect(res.status).toBe(200);
    expect(res.headers['content-disposition']).toBe(
      'attachment; filename="a\\"b.vcf"',
    );
  });
});

describe('CardsController with an empty directory', () => {
  let ctx: TestApp;

  beforeEach(async () => {
    ctx = await createTestApp({ cards: {} });
  });

  afterEach(async () => {
    await ctx.close();
  });

  it('returns 404 for /', async () => {
    const res = await request(ctx.app.getHttpServer()).get('/');
    expect(res.status).toBe(404);
  });
});

describe('application startup', () => {
  it('fails when the cards file is missing', async () => {
    await expect(
      createTestApp({ env: { CARDS_FILE: '/nonexistent/cards.json' } }),
    ).rejects.toThrow('is not readable');
  });
});
