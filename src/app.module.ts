import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { ApiModule } from './api/api.module';
import { IndexModule } from './index/index.module';
import searchConfig from './config/search.config';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [searchConfig],
    }),
    IndexModule,
    ApiModule,
  ],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule {}
