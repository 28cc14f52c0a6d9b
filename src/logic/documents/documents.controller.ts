import {
  Controller,
  Delete,
  Get,
  Headers,
  HttpCode,
  HttpStatus,
  MessageEvent,
  Param,
  Post,
  Query,
  Sse,
  Body,
  UploadedFile,
  UploadedFiles,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor, FilesInterceptor } from '@nestjs/platform-express';
import { map, Observable } from 'rxjs';
import { KnowledgeDocument } from '../../entities';
import { InvalidSubmissionError } from '../../utils/errors';
import { DocumentSource, SourceType } from '../../utils/types';
import { IngestionEventsService } from '../ingestion/ingestion-events.service';
import { DocumentsService } from './documents.service';
import { ListDocumentsQueryDto, MAX_BATCH_SIZE, SubmitWebDocumentDto, SubmitWebDocumentsDto } from './dto/documents.dto';

const MAX_PDF_BYTES = 25 * 1024 * 1024;

function pdfSource(file: Express.Multer.File | undefined): DocumentSource {
  if (!file) {
    throw new InvalidSubmissionError('No file uploaded');
  }
  if (file.mimetype !== 'application/pdf' && !file.originalname.toLowerCase().endsWith('.pdf')) {
    throw new InvalidSubmissionError('Only PDF files are accepted');
  }
  return { sourceType: SourceType.PDF, displayName: file.originalname, data: new Uint8Array(file.buffer) };
}

@Controller('documents')
export class DocumentsController {
  constructor(
    private readonly documentsService: DocumentsService,
    private readonly events: IngestionEventsService,
  ) {}

  @Post('pdf')
  @HttpCode(HttpStatus.ACCEPTED)
  @UseInterceptors(FileInterceptor('file', { limits: { fileSize: MAX_PDF_BYTES } }))
  async submitPdf(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Headers('x-user-role') role?: string,
  ) {
    const documentId = await this.documentsService.submitDocument(pdfSource(file), role ?? null);
    return { documentId };
  }

  @Post('pdf/batch')
  @HttpCode(HttpStatus.ACCEPTED)
  @UseInterceptors(FilesInterceptor('files', MAX_BATCH_SIZE, { limits: { fileSize: MAX_PDF_BYTES } }))
  async submitPdfs(
    @UploadedFiles() files: Express.Multer.File[] | undefined,
    @Headers('x-user-role') role?: string,
  ) {
    const documentIds = await this.documentsService.submitDocuments((files ?? []).map(pdfSource), role ?? null);
    return { documentIds };
  }

  @Post('web/batch')
  @HttpCode(HttpStatus.ACCEPTED)
  async submitWebBatch(@Body() body: SubmitWebDocumentsDto, @Headers('x-user-role') role?: string) {
    const documentIds = await this.documentsService.submitDocuments(
      body.urls.map(url => ({ sourceType: SourceType.WEB, displayName: url, url })),
      role ?? null,
    );
    return { documentIds };
  }

  @Post('web')
  @HttpCode(HttpStatus.ACCEPTED)
  async submitWeb(@Body() body: SubmitWebDocumentDto, @Headers('x-user-role') role?: string) {
    const documentId = await this.documentsService.submitDocument(
      { sourceType: SourceType.WEB, displayName: body.displayName ?? body.url, url: body.url },
      role ?? null,
    );
    return { documentId };
  }

  @Get()
  listDocuments(@Query() query: ListDocumentsQueryDto): Promise<KnowledgeDocument[]> {
    return this.documentsService.listDocuments(query.sourceType);
  }

  // Declared before ':id' so "events" is not taken for a document id.
  @Sse('events')
  streamEvents(): Observable<MessageEvent> {
    return this.events.events$.pipe(map(event => ({ type: 'ingestion', data: event })));
  }

  @Get(':id')
  getDocument(@Param('id') id: string): Promise<KnowledgeDocument> {
    return this.documentsService.getDocument(id);
  }

  @Get(':id/status')
  async getStatus(@Param('id') id: string) {
    const status = await this.documentsService.getIngestionStatus(id);
    return { documentId: id, status };
  }

  @Post(':id/reingest')
  @HttpCode(HttpStatus.ACCEPTED)
  @UseInterceptors(FileInterceptor('file', { limits: { fileSize: MAX_PDF_BYTES } }))
  async reingest(@Param('id') id: string, @UploadedFile() file: Express.Multer.File | undefined) {
    const document = await this.documentsService.reingestDocument(id, file ? pdfSource(file) : undefined);
    return { documentId: document.id, status: document.ingestionStatus };
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async deleteDocument(@Param('id') id: string): Promise<void> {
    await this.documentsService.deleteDocument(id);
  }
}
