import { Module } from '@nestjs/common';
import { IndexingService } from './indexing.service';
import { AnalysisModule } from '../analysis/analysis.module';
import { DocumentModule } from '../document/document.module';
import { StorageModule } from '../storage/storage.module';

@Module({
  imports: [StorageModule, AnalysisModule, DocumentModule],
  providers: [IndexingService],
  exports: [IndexingService],
})
export class IndexingModule {}
