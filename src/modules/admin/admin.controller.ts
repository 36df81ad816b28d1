import {
  Body,
  Controller,
  Get,
  HttpStatus,
  Logger,
  Post,
  Redirect,
  Req,
  Res,
  UseFilters,
  UseGuards,
} from '@nestjs/common';
import { ApiConsumes, ApiOperation, ApiTags } from '@nestjs/swagger';
import type { Request, Response } from 'express';
import { ADMIN_SESSION_COOKIE } from '../../app/constants';
import { AdminAuthService } from './admin-auth.service';
import { AdminSessionService } from './admin-session.service';
import { AdminStatsService } from './admin-stats.service';
import { LoginDto } from './dto/login.dto';
import { PasswordResetDto } from './dto/password-reset.dto';
import { AdminLoginRedirectFilter } from './filters/admin-login-redirect.filter';
import { AdminSessionGuard } from './guards/admin-session.guard';
import {
  renderDashboardPage,
  renderLoginPage,
  renderPasswordResetPage,
} from './views/admin.views';

@ApiTags('admin')
@UseFilters(AdminLoginRedirectFilter)
@Controller('admin')
export class AdminController {
  private readonly logger = new Logger(AdminController.name);

  constructor(
    private readonly authService: AdminAuthService,
    private readonly sessionService: AdminSessionService,
    private readonly statsService: AdminStatsService,
  ) {}

  @Get()
  @UseGuards(AdminSessionGuard)
  @ApiOperation({ summary: 'Counters dashboard' })
  async dashboard(
    @Res({ passthrough: true }) res: Response,
  ): Promise<string> {
    const rows = await this.statsService.rows();
    const page = renderDashboardPage(rows, this.statsService.totals(rows));
    res.type('html').set('Cache-Control', 'no-store');
    return page;
  }

  @Get('login')
  @ApiOperation({ summary: 'Login form' })
  async loginForm(@Req() req: Request, @Res() res: Response) {
    if (await this.sessionService.isValid(req.cookies?.[ADMIN_SESSION_COOKIE])) {
      return res.redirect(302, '/admin');
    }
    return res
      .type('html')
      .send(renderLoginPage({ resetEnabled: this.authService.resetEnabled }));
  }

  @Post('login')
  @ApiConsumes('application/x-www-form-urlencoded')
  @ApiOperation({ summary: 'Check the admin password and start a session' })
  async login(@Body() body: LoginDto, @Res() res: Response) {
    if (!(await this.authService.verifyPassword(body.password ?? ''))) {
      this.logger.warn('Admin login failed');
      return res
        .status(HttpStatus.UNAUTHORIZED)
        .type('html')
        .send(
          renderLoginPage({
            error: 'Incorrect password.',
            resetEnabled: this.authService.resetEnabled,
          }),
        );
    }

    const token = await this.sessionService.issue();
    this.logger.log('Admin logged in');
    res.cookie(ADMIN_SESSION_COOKIE, token, this.sessionService.cookieOptions);
    return res.redirect(302, '/admin');
  }

  @Get('logout')
  @ApiOperation({ summary: 'End the admin session' })
  logoutViaLink(@Res() res: Response) {
    return this.logout(res);
  }

  @Post('logout')
  @ApiOperation({ summary: 'End the admin session' })
  logoutViaForm(@Res() res: Response) {
    return this.logout(res);
  }

  @Get('password-reset')
  @ApiOperation({ summary: 'Password reset form' })
  passwordResetForm(@Res({ passthrough: true }) res: Response): string {
    res.type('html');
    return renderPasswordResetPage({ enabled: this.authService.resetEnabled });
  }

  @Post('password-reset')
  @ApiConsumes('application/x-www-form-urlencoded')
  @ApiOperation({ summary: 'Set a new admin password using the reset key' })
  async passwordReset(@Body() body: PasswordResetDto, @Res() res: Response) {
    const result = await this.authService.resetPassword(body);
    if (!result.ok) {
      return res
        .status(HttpStatus.BAD_REQUEST)
        .type('html')
        .send(renderPasswordResetPage({ error: result.error, enabled: true }));
    }
    return res.status(HttpStatus.OK).type('html').send(
      renderPasswordResetPage({
        notice: 'Password updated. You can now log in.',
        enabled: true,
      }),
    );
  }

  @Get('export.csv')
  @UseGuards(AdminSessionGuard)
  @ApiOperation({ summary: 'Download every counter as CSV' })
  async exportCsv(
    @Res({ passthrough: true }) res: Response,
  ): Promise<string> {
    const csv = await this.statsService.exportCsv();
    res
      .attachment('card-counters.csv')
      .set({
        'Content-Type': 'text/csv; charset=utf-8',
        'Cache-Control': 'no-store',
      });
    return csv;
  }

  @Post('reset-counters')
  @UseGuards(AdminSessionGuard)
  @Redirect('/admin', 302)
  @ApiOperation({ summary: 'Reset every counter of every card' })
  async resetCounters(): Promise<void> {
    await this.statsService.resetAll();
    this.logger.warn('Counters reset from the dashboard');
  }

  private logout(res: Response) {
    res.clearCookie(ADMIN_SESSION_COOKIE, { path: '/' });
    this.logger.log('Admin logged out');
    return res.redirect(302, '/admin/login');
  }
}
