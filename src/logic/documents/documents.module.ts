import { Module } from '@nestjs/common';
import { ElasticService } from '../elastic/elastic.service';
import { DocumentsController } from './documents.controller';
import { DocumentStoreService } from './document-store.service';

@Module({
    controllers: [DocumentsController],
    providers: [ElasticService, DocumentStoreService],
    exports: [DocumentStoreService],
})
export class DocumentsModule {}
