import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

export const TEST_SECRET = 'test-secret';
export const TEST_PASSWORD = 'test-password';
export const TEST_RESET_KEY = 'test-reset-key';
export const TEST_BASE_URL = 'https://cards.example.com';

export const TEST_CARDS = {
  ada: {
    display_name: 'Ada Example',
    org: 'Example Works',
    title: 'Director',
    whatsapp_display: '082 000 0001',
    whatsapp_e164: '27820000001',
    office_display: '010 000 0002',
    office_e164: '27100000002',
    email: 'ada@example.com',
    website_display: 'example.com',
    website_url: 'https://www.example.com',
    address_display: '1 Test Road, Testville',
    maps_destination: '1%20Test%20Road%2C%20Testville',
  },
  grace: {
    display_name: 'Grace Sample',
    org: 'Sample & Co',
    title: 'Engineer',
    whatsapp_display: '082 000 0003',
    whatsapp_e164: '27820000003',
    office_display: '010 000 0004',
    office_e164: '27100000004',
    email: 'grace@example.com',
    website_display: 'sample.example.com',
    website_url: 'https://sample.example.com',
  },
};

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'cards-test-'));
}

export async function writeJson(filePath: string, data: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(data, null, 2), 'utf8');
}

export async function readJson(filePath: string): Promise<unknown> {
  return JSON.parse(await fs.readFile(filePath, 'utf8'));
}
