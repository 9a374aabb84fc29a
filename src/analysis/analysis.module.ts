import { Module } from '@nestjs/common';
import { StorageModule } from '../storage/storage.module';
import { StopwordLoaderService } from './stopword-loader.service';

@Module({
  imports: [StorageModule],
  providers: [StopwordLoaderService],
  exports: [StopwordLoaderService],
})
export class AnalysisModule {}
