import { Logger } from '@nestjs/common';
import { JsonFileUtils } from '../common/utils/json-file.utils';

export interface AdminPasswordDocument {
  password_hash: string;
  updated_at: string;
}

/**
 * The persisted admin password hash. Absent until the reset flow writes it.
 */
export class AdminPasswordStore {
  private readonly logger = new Logger(AdminPasswordStore.name);

  constructor(private readonly filePath: string) {}

  async getHash(): Promise<string | undefined> {
    const result = await JsonFileUtils.readObject(this.filePath);
    if (result.status === 'missing') return undefined;
    if (result.status === 'invalid') {
      this.logger.warn(
        `Ignoring unreadable admin password file ${this.filePath}: ${result.reason}`,
      );
      return undefined;
    }

    const hash = result.value.password_hash;
    if (typeof hash !== 'string' || !hash) {
      this.logger.warn(
        `Admin password file ${this.filePath} has no password_hash`,
      );
      return undefined;
    }
    return hash;
  }

  async setHash(passwordHash: string): Promise<void> {
    const document: AdminPasswordDocument = {
      password_hash: passwordHash,
      updated_at: new Date().toISOString(),
    };
    await JsonFileUtils.writeAtomic(this.filePath, document);
    this.logger.log(`Admin password hash written to ${this.filePath}`);
  }
}
