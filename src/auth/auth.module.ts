/* eslint-disable prettier/prettier */
import { Module } from '@nestjs/common';
import { JwtModule, JwtModuleOptions } from '@nestjs/jwt';
import { PassportModule } from '@nestjs/passport';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConfigModule, ConfigService } from '@nestjs/config';

import { AuthController } from './auth.controller';
import { AuthService } from './auth.service';
import { CompanyAccountEntity } from './entities/company-account.entity';
import { JwtStrategy } from './jwt.strategy';
import { SessionGuard } from './guards/session.guard';
import { CompanyStoreModule } from '../company-store/company-store.module';

@Module({
  imports: [
    JwtModule.registerAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService): JwtModuleOptions => {
        // Sessions do not expire unless SESSION_EXPIRES_IN is set
        const expiresIn = configService.get<number>('sessionExpiresIn');
        return {
          secret: configService.get<string>('sessionSecret'),
          signOptions: expiresIn ? { expiresIn } : {},
        };
      },
      inject: [ConfigService],
    }),
    PassportModule.register({ defaultStrategy: 'jwt' }),
    TypeOrmModule.forFeature([CompanyAccountEntity]),
    CompanyStoreModule,
  ],
  controllers: [AuthController],
  providers: [AuthService, JwtStrategy, SessionGuard],
  exports: [AuthService, JwtStrategy, SessionGuard, PassportModule],
})
export class AuthModule {}
