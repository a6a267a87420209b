import { Module } from '@nestjs/common';
import { AuthModule } from '../auth/auth.module';
import { CamposModule } from '../campos/campos.module';
import { CompanyStoreModule } from '../company-store/company-store.module';
import { RegistrosController } from './registros.controller';
import { RegistrosService } from './registros.service';

@Module({
  imports: [AuthModule, CompanyStoreModule, CamposModule],
  controllers: [RegistrosController],
  providers: [RegistrosService],
})
export class RegistrosModule {}
