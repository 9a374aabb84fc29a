import { Module } from '@nestjs/common';
import { IndexService } from './index.service';
import { IndexingModule } from '../indexing/indexing.module';

@Module({
  imports: [IndexingModule],
  providers: [IndexService],
  exports: [IndexService],
})
export class IndexModule {}
