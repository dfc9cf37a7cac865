import { Module } from '@nestjs/common';
import { BindingModule } from '../binding/binding.module';
import { NotesController } from './notes.controller';
import { NotesService } from './notes.service';

@Module({
  imports: [BindingModule],
  controllers: [NotesController],
  providers: [NotesService],
})
export class NotesModule {}
