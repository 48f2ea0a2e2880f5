import { Module } from '@nestjs/common';
import { StorageService } from './storage.service';
import { storageProviderFactory } from './storage.provider.factory';

@Module({
  providers: [storageProviderFactory, StorageService],
  exports: [StorageService],
})
export class StorageModule {}
