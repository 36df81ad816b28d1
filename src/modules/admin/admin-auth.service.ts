import { ForbiddenException, Injectable, Logger } from '@nestjs/common';
import * as bcrypt from 'bcryptjs';
import * as crypto from 'crypto';
import { AppConfigService } from '../../app/configs/app-config.service';
import {
  BCRYPT_PREFIXES,
  MIN_ADMIN_PASSWORD_LENGTH,
} from '../../app/constants';
import { AdminPasswordStore } from '../../storage/admin-password.store';
import { PasswordResetDto } from './dto/password-reset.dto';

const BCRYPT_ROUNDS = 12;

export type PasswordResetResult = { ok: true } | { ok: false; error: string };

export function isBcryptHash(value: string): boolean {
  return BCRYPT_PREFIXES.some((prefix) => value.startsWith(prefix));
}

/**
 * Compares digests so the comparison time does not depend on where the
 * inputs first differ, nor on their lengths.
 */
export function safeEqual(a: string, b: string): boolean {
  const digest = (value: string) =>
    crypto.createHash('sha256').update(value, 'utf8').digest();
  return crypto.timingSafeEqual(digest(a), digest(b));
}

@Injectable()
export class AdminAuthService {
  private readonly logger = new Logger(AdminAuthService.name);

  constructor(
    private readonly passwordStore: AdminPasswordStore,
    private readonly appConfigService: AppConfigService,
  ) {}

  /**
   * The persisted hash wins; ADMIN_PASSWORD (plain or bcrypt) is the fallback.
   */
  async verifyPassword(password: string): Promise<boolean> {
    if (!password) return false;

    const storedHash = await this.passwordStore.getHash();
    if (storedHash) {
      return bcrypt.compare(password, storedHash);
    }

    const configured = this.appConfigService.adminPassword;
    if (!configured) {
      this.logger.warn('Admin login attempted but no admin password is configured');
      return false;
    }
    if (isBcryptHash(configured)) {
      return bcrypt.compare(password, configured);
    }
    return safeEqual(password, configured);
  }

  get resetEnabled(): boolean {
    return Boolean(this.appConfigService.adminResetKey);
  }

  async resetPassword(dto: PasswordResetDto): Promise<PasswordResetResult> {
    const resetKey = this.appConfigService.adminResetKey;
    if (!resetKey) {
      throw new ForbiddenException('Password reset is disabled');
    }

    if (!safeEqual(dto.reset_key, resetKey)) {
      this.logger.warn('Password reset rejected: invalid reset key');
      return { ok: false, error: 'Invalid reset key.' };
    }
    if (dto.new_password.length < MIN_ADMIN_PASSWORD_LENGTH) {
      return {
        ok: false,
        error: `Password must be at least ${MIN_ADMIN_PASSWORD_LENGTH} characters.`,
      };
    }
    if (dto.new_password !== dto.confirm_password) {
      return { ok: false, error: 'Passwords do not match.' };
    }

    const hash = await bcrypt.hash(dto.new_password, BCRYPT_ROUNDS);
    await this.passwordStore.setHash(hash);
    this.logger.log('Admin password changed through the reset flow');
    return { ok: true };
  }
}
