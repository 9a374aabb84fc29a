import { Module } from '@nestjs/common';
import { IndexController } from './controllers/index.controller';
import { SearchController } from './controllers/search.controller';
import { IndexModule } from '../index/index.module';
import { SearchModule } from '../search/search.module';

@Module({
  imports: [IndexModule, SearchModule],
  controllers: [IndexController, SearchController],
})
export class ApiModule {}
