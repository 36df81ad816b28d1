import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import type { Request } from 'express';
import { ADMIN_SESSION_COOKIE } from '../../../app/constants';
import { AdminSessionService } from '../admin-session.service';

export class AdminLoginRequiredException extends Error {
  constructor() {
    super('Admin login required');
    this.name = 'AdminLoginRequiredException';
  }
}

@Injectable()
export class AdminSessionGuard implements CanActivate {
  constructor(private readonly sessionService: AdminSessionService) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<Request>();
    const token: unknown = request.cookies?.[ADMIN_SESSION_COOKIE];

    if (await this.sessionService.isValid(token)) {
      return true;
    }
    throw new AdminLoginRequiredException();
  }
}
