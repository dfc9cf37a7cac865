import {
  Body,
  Controller,
  DefaultValuePipe,
  Get,
  HttpCode,
  HttpStatus,
  ParseIntPipe,
  Post,
  Query,
  UseInterceptors,
} from '@nestjs/common';
import { ApiBody, ApiOperation, ApiQuery, ApiResponse, ApiTags } from '@nestjs/swagger';
import { TenantBindingInterceptor } from '../binding/tenant-binding.interceptor';
import { TenantStore } from '../common/decorators/tenant.decorator';
import { StoreHandle } from '../switchboard/store-handle';
import { CreateNoteDto } from './dto/create-note.dto';
import { Note, NotesService } from './notes.service';

const noteSchema = {
  type: 'object',
  properties: {
    id: { type: 'integer', example: 1 },
    body: { type: 'string', example: 'Call the supplier on Monday' },
    createdAt: { type: 'string', format: 'date-time' },
  },
};

@ApiTags('Notes')
@UseInterceptors(TenantBindingInterceptor)
@Controller('notes')
export class NotesController {
  constructor(private readonly notesService: NotesService) {}

  @Get()
  @ApiOperation({
    summary: 'List Notes',
    description: "List the calling tenant's notes, newest first",
  })
  @ApiQuery({ name: 'limit', required: false, example: 50 })
  @ApiResponse({ status: 200, schema: { type: 'array', items: noteSchema } })
  @ApiResponse({ status: 404, description: 'Unknown tenant' })
  @ApiResponse({ status: 403, description: 'Tenant suspended' })
  findAll(
    @TenantStore() store: StoreHandle,
    @Query('limit', new DefaultValuePipe(50), ParseIntPipe) limit: number,
  ): Promise<Note[]> {
    return this.notesService.list(store, Math.min(Math.max(limit, 1), 500));
  }

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Create Note' })
  @ApiBody({ type: CreateNoteDto })
  @ApiResponse({ status: 201, schema: noteSchema })
  @ApiResponse({ status: 400, description: 'Invalid note' })
  create(@TenantStore() store: StoreHandle, @Body() dto: CreateNoteDto): Promise<Note> {
    return this.notesService.create(store, dto.body);
  }
}
