import {
    BadRequestException,
    Controller,
    Delete,
    Get,
    Logger,
    Post,
    Query,
    UploadedFile,
    UseGuards,
    UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { isSupportedFile, SUPPORTED_EXTENSIONS } from '../../utils/textNormalizer';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { ApprovedUserGuard } from '../auth/guards/approved-user.guard';
import { DocumentStoreService, IngestResult } from './document-store.service';

@Controller('documents')
@UseGuards(JwtAuthGuard, ApprovedUserGuard)
export class DocumentsController {
    private readonly logger = new Logger(DocumentsController.name);

    constructor(private readonly documentStore: DocumentStoreService) {}

    @Post()
    @UseInterceptors(FileInterceptor('file'))
    async upload(@UploadedFile() file?: Express.Multer.File): Promise<IngestResult> {
        if (!file) {
            throw new BadRequestException('No file uploaded');
        }
        if (!isSupportedFile(file.originalname)) {
            throw new BadRequestException(`Unsupported file type. Allowed: ${SUPPORTED_EXTENSIONS.join(', ')}`);
        }
        this.logger.log(`Ingesting ${file.originalname} (${file.size} bytes)`);
        return this.documentStore.ingest(file.originalname, file.buffer);
    }

    @Get()
    async list(): Promise<{ sources: string[] }> {
        return { sources: await this.documentStore.listSources() };
    }

    @Delete()
    async remove(@Query('source') source?: string): Promise<{ deleted: number }> {
        return { deleted: await this.documentStore.deleteDocuments(source?.trim() || undefined) };
    }
}
