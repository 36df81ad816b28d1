import { ArgumentsHost, Catch, ExceptionFilter, Logger } from '@nestjs/common';
import type { Request, Response } from 'express';
import { ADMIN_SESSION_COOKIE } from '../../../app/constants';
import { AdminLoginRequiredException } from '../guards/admin-session.guard';

/**
 * Unauthenticated admin requests are sent to the login form instead of
 * receiving an error body. A stale cookie is cleared on the way.
 */
@Catch(AdminLoginRequiredException)
export class AdminLoginRedirectFilter implements ExceptionFilter {
  private readonly logger = new Logger(AdminLoginRedirectFilter.name);

  catch(_exception: AdminLoginRequiredException, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<Request>();
    const response = ctx.getResponse<Response>();

    this.logger.debug(`Redirecting ${request.method} ${request.url} to login`);

    if (request.cookies?.[ADMIN_SESSION_COOKIE]) {
      response.clearCookie(ADMIN_SESSION_COOKIE, { path: '/' });
    }
    response.redirect(302, '/admin/login');
  }
}
