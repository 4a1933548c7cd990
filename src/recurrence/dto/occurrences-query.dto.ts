import { ApiProperty } from '@nestjs/swagger';
import { IsInt, IsOptional, Max, Min } from 'class-validator';
import { Type } from 'class-transformer';
import { MAX_OCCURRENCE_COUNT } from '../constants/recurrence.constants';
import { ResolveScheduleDto } from './resolve-schedule.dto';

export class OccurrencesQueryDto extends ResolveScheduleDto {
  @ApiProperty({
    description: 'Maximum number of occurrences to return',
    example: 10,
    required: false,
    minimum: 1,
    maximum: MAX_OCCURRENCE_COUNT,
  })
  @IsOptional()
  @IsInt()
  @Type(() => Number)
  @Min(1)
  @Max(MAX_OCCURRENCE_COUNT)
  count?: number;
}
