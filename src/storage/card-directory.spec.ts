import * as fs from 'fs/promises';
import * as path from 'path';
import { Logger } from '@nestjs/common';
import { CardDirectory, CardDirectoryError } from './card-directory';
import { makeTempDir, TEST_CARDS, writeJson } from '../testing/fixtures';

describe('CardDirectory', () => {
  let dir: string;
  let file: string;

  beforeAll(() => {
    Logger.overrideLogger(false);
  });

  beforeEach(async () => {
    dir = await makeTempDir();
    file = path.join(dir, 'cards.json');
    await writeJson(file, TEST_CARDS);
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it.each(Object.keys(TEST_CARDS))(
    'returns a record whose slug is the requested slug (%s)',
    async (slug) => {
      const card = await new CardDirectory(file).getCard(slug);
      expect(card?.slug).toBe(slug);
    },
  );

  it('returns the stored fields', async () => {
    const card = await new CardDirectory(file).getCard('ada');
    expect(card?.display_name).toBe('Ada Example');
    expect(card?.whatsapp_e164).toBe('27820000001');
    expect(card?.maps_destination).toBe('1%20Test%20Road%2C%20Testville');
  });

  it('overrides a slug stored inside the record with its key', async () => {
    await writeJson(file, { ada: { ...TEST_CARDS.ada, slug: 'other' } });
    const card = await new CardDirectory(file).getCard('ada');
    expect(card?.slug).toBe('ada');
  });

  it('returns undefined for an unknown slug', async () => {
    const directory = new CardDirectory(file);
    await expect(directory.getCard('nobody')).resolves.toBeUndefined();
    await expect(directory.getCard('constructor')).resolves.toBeUndefined();
  });

  it('sees edits to the file without a restart', async () => {
    const directory = new CardDirectory(file);
    await expect(directory.getCard('linus')).resolves.toBeUndefined();

    await writeJson(file, { ...TEST_CARDS, linus: TEST_CARDS.grace });

    const card = await directory.getCard('linus');
    expect(card?.display_name).toBe('Grace Sample');
  });

  it('uses the first key as the default slug', async () => {
    await expect(new CardDirectory(file).getDefaultSlug()).resolves.toBe('ada');
  });

  it('prefers the configured default slug', async () => {
    await expect(
      new CardDirectory(file, 'grace').getDefaultSlug(),
    ).resolves.toBe('grace');
  });

  it('has no default slug when the directory is empty', async () => {
    await writeJson(file, {});
    await expect(
      new CardDirectory(file).getDefaultSlug(),
    ).resolves.toBeUndefined();
  });

  it('lists every card in file order', async () => {
    const cards = await new CardDirectory(file).listCards();
    expect(cards.map((card) => card.slug)).toEqual(['ada', 'grace']);
    expect(cards.every((card) => 'card' in card)).toBe(true);
  });

  it('lists an invalid record with its error', async () => {
    await writeJson(file, {
      ada: TEST_CARDS.ada,
      broken: { display_name: 'Broken' },
    });

    const [ada, broken] = await new CardDirectory(file).listCards();

    expect('card' in ada && ada.card.display_name).toBe('Ada Example');
    expect(broken.slug).toBe('broken');
    expect('error' in broken && broken.error).toMatch(
      /^Card "broken" is invalid: /,
    );
  });

  it('rejects a record that fails validation', async () => {
    await writeJson(file, {
      ada: { ...TEST_CARDS.ada, email: 'not-an-email' },
    });

    await expect(new CardDirectory(file).getCard('ada')).rejects.toThrow(
      CardDirectoryError,
    );
  });

  it('rejects a document that is not an object', async () => {
    await fs.writeFile(file, '[]', 'utf8');
    await expect(new CardDirectory(file).getCard('ada')).rejects.toThrow(
      'is not a JSON object',
    );
  });

  it('fails assertReadable when the file is missing', async () => {
    await fs.rm(file);
    await expect(new CardDirectory(file).assertReadable()).rejects.toThrow(
      CardDirectoryError,
    );
  });

  it('fails lookups when the file disappears after startup', async () => {
    const directory = new CardDirectory(file);
    await directory.assertReadable();
    await fs.rm(file);

    await expect(directory.getCard('ada')).rejects.toThrow('not found');
  });
});
