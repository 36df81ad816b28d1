import { Test } from '@nestjs/testing';
import { NestExpressApplication } from '@nestjs/platform-express';
import * as fs from 'fs/promises';
import * as path from 'path';
import { AppModule } from '../app/app.module';
import { configureApp } from '../app/app.setup';
import {
  makeTempDir,
  TEST_BASE_URL,
  TEST_CARDS,
  TEST_PASSWORD,
  TEST_RESET_KEY,
  TEST_SECRET,
  writeJson,
} from './fixtures';

export interface TestApp {
  app: NestExpressApplication;
  dataDir: string;
  close(): Promise<void>;
}

const MANAGED_ENV = [
  'NODE_ENV',
  'DATA_DIR',
  'CARDS_FILE',
  'COUNTERS_FILE',
  'ADMIN_PASSWORD_FILE',
  'STATIC_DIR',
  'DEFAULT_CARD_SLUG',
  'PUBLIC_BASE_URL',
  'ADMIN_PASSWORD',
  'ADMIN_SECRET',
  'ADMIN_RESET_KEY',
  'ADMIN_SESSION_TTL_HOURS',
];

/**
 * Boots the full application against a fresh temp data directory holding
 * TEST_CARDS (unless `cards` says otherwise).
 */
export async function createTestApp(
  options: {
    env?: Record<string, string | undefined>;
    cards?: Record<string, unknown>;
  } = {},
): Promise<TestApp> {
  const dataDir = await makeTempDir();
  await writeJson(path.join(dataDir, 'cards.json'), options.cards ?? TEST_CARDS);

  const env: Record<string, string | undefined> = {
    NODE_ENV: 'test',
    DATA_DIR: dataDir,
    STATIC_DIR: path.join(dataDir, 'static'),
    PUBLIC_BASE_URL: TEST_BASE_URL,
    ADMIN_PASSWORD: TEST_PASSWORD,
    ADMIN_SECRET: TEST_SECRET,
    ADMIN_RESET_KEY: TEST_RESET_KEY,
    ...options.env,
  };
  for (const key of MANAGED_ENV) {
    const value = env[key];
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }

  const moduleRef = await Test.createTestingModule({
    imports: [AppModule],
  }).compile();
  const app = moduleRef.createNestApplication<NestExpressApplication>({
    logger: false,
  });
  configureApp(app);
  await app.init();

  return {
    app,
    dataDir,
    close: async () => {
      await app.close();
      await fs.rm(dataDir, { recursive: true, force: true });
    },
  };
}
