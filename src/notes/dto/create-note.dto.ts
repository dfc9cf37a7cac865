import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class CreateNoteDto {
  @ApiProperty({
    description: 'Note text',
    example: 'Call the supplier on Monday',
  })
  @IsString()
  @IsNotEmpty()
  @MaxLength(10_000)
  body!: string;
}
