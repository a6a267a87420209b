import { Module } from '@nestjs/common';
import { AuthModule } from '../auth/auth.module';
import { CompanyStoreModule } from '../company-store/company-store.module';
import { CamposController } from './campos.controller';
import { CamposService } from './campos.service';

@Module({
  imports: [AuthModule, CompanyStoreModule],
  controllers: [CamposController],
  providers: [CamposService],
  exports: [CamposService],
})
export class CamposModule {}
