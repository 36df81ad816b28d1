import { Injectable, Logger } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import type { CookieOptions } from 'express';
import { AppConfigService } from '../../app/configs/app-config.service';
import { ADMIN_SESSION_SUBJECT } from '../../app/constants';

interface AdminSessionPayload {
  sub: string;
}

function isAdminSessionPayload(value: unknown): value is AdminSessionPayload {
  return (
    typeof value === 'object' &&
    value !== null &&
    'sub' in value &&
    value.sub === ADMIN_SESSION_SUBJECT
  );
}

/**
 * The admin session is a signed JWT kept in an httpOnly cookie; nothing is
 * stored server-side.
 */
@Injectable()
export class AdminSessionService {
  private readonly logger = new Logger(AdminSessionService.name);

  constructor(
    private readonly jwtService: JwtService,
    private readonly appConfigService: AppConfigService,
  ) {}

  issue(): Promise<string> {
    const payload: AdminSessionPayload = { sub: ADMIN_SESSION_SUBJECT };
    return this.jwtService.signAsync(payload);
  }

  async isValid(token: unknown): Promise<boolean> {
    if (typeof token !== 'string' || !token) return false;
    try {
      const payload: unknown = await this.jwtService.verifyAsync(token);
      return isAdminSessionPayload(payload);
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      this.logger.debug(`Rejected admin session cookie: ${reason}`);
      return false;
    }
  }

  get cookieOptions(): CookieOptions {
    return {
      httpOnly: true,
      sameSite: 'lax',
      secure: this.appConfigService.isProduction,
      path: '/',
      maxAge: this.appConfigService.adminSessionTtlSeconds * 1000,
    };
  }
}
