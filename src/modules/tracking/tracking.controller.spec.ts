import request from 'supertest';
import { CountersStore } from '../../storage/counters.store';
import { createTestApp, TestApp } from '../../testing/test-app';

describe('TrackingController', () => {
  let ctx: TestApp;
  let counters: CountersStore;

  beforeEach(async () => {
    ctx = await createTestApp();
    counters = ctx.app.get(CountersStore);
  });

  afterEach(async () => {
    await ctx.close();
  });

  it('redirects to WhatsApp with the prefilled text and counts once', async () => {
    const res = await request(ctx.app.getHttpServer()).get(
      '/go/whatsapp/ada?text=Hello',
    );

    expect(res.status).toBe(302);
    expect(res.headers.location).toBe('https://wa.me/27820000001?text=Hello');
    expect((await counters.read('ada')).whatsapp_clicks).toBe(1);
  });

  it('encodes the WhatsApp text', async () => {
    const res = await request(ctx.app.getHttpServer())
      .get('/go/whatsapp/ada')
      .query({ text: 'Hi there' });

    expect(res.headers.location).toBe(
      'https://wa.me/27820000001?text=Hi%20there',
    );
  });

  it('omits the text parameter when none is given', async () => {
    const res = await request(ctx.app.getHttpServer()).get('/go/whatsapp/ada');

    expect(res.headers.location).toBe('https://wa.me/27820000001');
  });

  it('redirects to a mailto link', async () => {
    const res = await request(ctx.app.getHttpServer())
      .get('/go/email/ada')
      .query({ subject: 'Card enquiry' });

    expect(res.status).toBe(302);
    expect(res.headers.location).toBe(
      'mailto:ada@example.com?subject=Card%20enquiry',
    );
    expect((await counters.read('ada')).email_clicks).toBe(1);
  });

  it('redirects to the map search using the stored destination', async () => {
    const res = await request(ctx.app.getHttpServer()).get('/go/map/ada');

    expect(res.status).toBe(302);
    expect(res.headers.location).toBe(
      'https://www.google.com/maps/search/?api=1&query=1%20Test%20Road%2C%20Testville',
    );
    expect((await counters.read('ada')).map_clicks).toBe(1);
  });

  it('counts a share with an empty response', async () => {
    const res = await request(ctx.app.getHttpServer()).get('/go/share/grace');

    expect(res.status).toBe(204);
    expect(res.text).toBe('');
    expect((await counters.read('grace')).share_clicks).toBe(1);
  });

  it('counts an NFC tap and redirects to the card page', async () => {
    const res = await request(ctx.app.getHttpServer()).get('/go/nfc/ada');

    expect(res.status).toBe(302);
    expect(res.headers.location).toBe('/c/ada');
    expect((await counters.read('ada')).nfc_scans).toBe(1);
  });

  it('keeps counters of different cards apart', async () => {
    const server = ctx.app.getHttpServer();
    await request(server).get('/go/nfc/ada');
    await request(server).get('/go/nfc/ada');
    await request(server).get('/go/nfc/grace');

    expect((await counters.read('ada')).nfc_scans).toBe(2);
    expect((await counters.read('grace')).nfc_scans).toBe(1);
  });

  it.each([
    '/go/whatsapp/nobody',
    '/go/email/nobody',
    '/go/map/nobody',
    '/go/share/nobody',
    '/go/nfc/nobody',
  ])('returns 404 for %s without writing a counter', async (url) => {
    const res = await request(ctx.app.getHttpServer()).get(url);

    expect(res.status).toBe(404);
    expect(res.body.error).toBe('Card "nobody" not found');
    await expect(counters.readAll()).resolves.toEqual({});
  });
});
