import { Injectable } from '@nestjs/common';
import { IndexService } from './index/index.service';

export interface HealthStatus {
  status: 'ok';
  version: string;
  indices: number;
}

@Injectable()
export class AppService {
  constructor(private readonly indexService: IndexService) {}

  getHealth(): HealthStatus {
    return {
      status: 'ok',
      version: process.env.npm_package_version ?? '0.1.0',
      indices: this.indexService.indexCount,
    };
  }
}
