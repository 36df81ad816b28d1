import * as bcrypt from 'bcryptjs';
import * as dotenv from 'dotenv';
import * as path from 'path';
import { MIN_ADMIN_PASSWORD_LENGTH } from '../src/app/constants';
import { AdminPasswordStore } from '../src/storage/admin-password.store';

// Load environment variables
dotenv.config();

// Usage: npm run admin:hash -- [password] [--write]
const args = process.argv.slice(2);
const write = args.includes('--write');
const password = args.find((arg) => !arg.startsWith('--')) ?? process.env.ADMIN_PASSWORD;

const ADMIN_PASSWORD_FILE = path.resolve(
  process.env.ADMIN_PASSWORD_FILE ??
    path.join(process.env.DATA_DIR ?? './data', 'admin_password.json'),
);

if (!password) {
  console.error('Error: pass a password or set ADMIN_PASSWORD in .env');
  process.exit(1);
}

if (password.length < MIN_ADMIN_PASSWORD_LENGTH) {
  console.error(
    `Error: password must be at least ${MIN_ADMIN_PASSWORD_LENGTH} characters`,
  );
  process.exit(1);
}

async function main(plain: string) {
  const hash = await bcrypt.hash(plain, 12);

  if (!write) {
    // Suitable as ADMIN_PASSWORD in .env
    console.log(hash);
    return;
  }

  await new AdminPasswordStore(ADMIN_PASSWORD_FILE).setHash(hash);
  console.log(`Admin password hash written to ${ADMIN_PASSWORD_FILE}`);
}

main(password).catch((error: unknown) => {
  console.error('Error hashing admin password:', error);
  process.exit(1);
});
