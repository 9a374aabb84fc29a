import { Module } from '@nestjs/common';
import { StorageModule } from '../storage/storage.module';
import { DocumentScannerService } from './document-scanner.service';

@Module({
  imports: [StorageModule],
  providers: [DocumentScannerService],
  exports: [DocumentScannerService],
})
export class DocumentModule {}
