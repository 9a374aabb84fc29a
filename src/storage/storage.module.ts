import { Module } from '@nestjs/common';
import { CorpusReaderService } from './corpus/corpus-reader.service';

@Module({
  providers: [CorpusReaderService],
  exports: [CorpusReaderService],
})
export class StorageModule {}
