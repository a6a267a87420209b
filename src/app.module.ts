/* eslint-disable prettier/prettier */
import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { APP_INTERCEPTOR } from '@nestjs/core';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule, TypeOrmModuleOptions } from '@nestjs/typeorm';
import { join } from 'path';
import configuration from './config/configuration';
import { envFilePaths } from './config/env-files';
import { AuthModule } from './auth/auth.module';
import { CamposModule } from './campos/campos.module';
import { RegistrosModule } from './registros/registros.module';
import { CompanyStoreModule } from './company-store/company-store.module';
import { FlashErrorsInterceptor } from './common/interceptors/flash-errors.interceptor';
import { LoggingMiddleware } from './common/middleware/logging.middleware';

@Module({
  imports: [
    ConfigModule.forRoot({
      envFilePath: envFilePaths(process.env.NODE_ENV),
      isGlobal: true, // Makes ConfigService available globally
      load: [configuration],
    }),

    // The shared directory of company accounts. Company data never lives here:
    // each company has its own store file opened by CompanyStoreService.
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService): TypeOrmModuleOptions => ({
        type: 'better-sqlite3',
        database: join(configService.getOrThrow<string>('dataDir'), 'users.db'),
        autoLoadEntities: true,
        synchronize: true,
        logging: false,
      }),
      inject: [ConfigService],
    }),

    AuthModule,
    CompanyStoreModule,
    CamposModule,
    RegistrosModule,
  ],
  providers: [
    {
      provide: APP_INTERCEPTOR,
      useClass: FlashErrorsInterceptor,
    },
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer.apply(LoggingMiddleware).forRoutes('*');
  }
}
