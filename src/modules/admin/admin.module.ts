import { Module } from '@nestjs/common';
import { JwtModule } from '@nestjs/jwt';
import { AppConfigService } from '../../app/configs/app-config.service';
import { AdminAuthService } from './admin-auth.service';
import { AdminController } from './admin.controller';
import { AdminSessionService } from './admin-session.service';
import { AdminStatsService } from './admin-stats.service';
import { AdminSessionGuard } from './guards/admin-session.guard';

@Module({
  imports: [
    JwtModule.registerAsync({
      inject: [AppConfigService],
      useFactory: (appConfigService: AppConfigService) => ({
        secret: appConfigService.adminSecret,
        signOptions: { expiresIn: appConfigService.adminSessionTtlSeconds },
      }),
    }),
  ],
  controllers: [AdminController],
  providers: [
    AdminAuthService,
    AdminSessionService,
    AdminStatsService,
    AdminSessionGuard,
  ],
})
export class AdminModule {}
