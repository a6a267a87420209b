import { Module } from '@nestjs/common';
import { CompanyStoreService } from './company-store.service';

@Module({
  providers: [CompanyStoreService],
  exports: [CompanyStoreService],
})
export class CompanyStoreModule {}
