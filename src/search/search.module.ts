import { Module } from '@nestjs/common';
import { SearchService } from './search.service';
import { IndexModule } from '../index/index.module';

@Module({
  imports: [IndexModule],
  providers: [SearchService],
  exports: [SearchService],
})
export class SearchModule {}
