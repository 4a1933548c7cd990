import { ApiProperty } from '@nestjs/swagger';
import {
  Repetition,
  ScheduleSummary,
} from '../interfaces/recurrence.interface';
import { SimpleDate } from '../domain/simple-date';

export class ScheduleResponseDto {
  @ApiProperty({ example: '2024-10-07' })
  start: string;

  @ApiProperty({
    description:
      'Parsed schedule as tagged unions (type/value) with nth, on, days, weekid and day fields',
    nullable: true,
    example: {
      delta: { type: 'Week', value: { nth: 2, on: ['Monday', 'Thursday'] } },
      end: { type: 'Count', value: 5 },
    },
  })
  repetition: Repetition | null;

  @ApiProperty({
    example: 'Every 2 weeks on Monday, Thursday ending after 5 occurrences',
  })
  description: string;

  @ApiProperty({ example: '2024-10-24', nullable: true })
  next: string | null;

  @ApiProperty({ example: '2024-12-19', nullable: true })
  last: string | null;

  constructor(summary: ScheduleSummary) {
    this.start = summary.start.toString();
    this.repetition = summary.repetition;
    this.description = summary.description;
    this.next = summary.next?.toString() ?? null;
    this.last = summary.last?.toString() ?? null;
  }
}

export class OccurrencesResponseDto {
  @ApiProperty({ type: [String], example: ['2024-10-07', '2024-10-24'] })
  occurrences: string[];

  constructor(dates: SimpleDate[]) {
    this.occurrences = dates.map((date) => date.toString());
  }
}
