import { ApiProperty } from '@nestjs/swagger';
import { IsOptional, IsString, MaxLength } from 'class-validator';

export class ResolveScheduleDto {
  @ApiProperty({
    description: 'Repetition schedule; blank for a date that does not repeat',
    example: 'every 2 weeks on mon, thu',
  })
  @IsString()
  @MaxLength(200)
  schedule!: string;

  @ApiProperty({
    description: 'When the schedule stops; blank or "never" for no end',
    example: 'after 5 times',
    required: false,
  })
  @IsOptional()
  @IsString()
  @MaxLength(200)
  end?: string;

  @ApiProperty({
    description: 'Start date (YYYY-MM-DD); blank for today',
    example: '2024-10-07',
    required: false,
  })
  @IsOptional()
  @IsString()
  @MaxLength(32)
  start?: string;
}
