import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { RecurrenceService } from './recurrence.service';
import { RecurrenceController } from './controllers/recurrence.controller';

@Module({
  imports: [ConfigModule],
  controllers: [RecurrenceController],
  providers: [RecurrenceService],
  exports: [RecurrenceService],
})
export class RecurrenceModule {}
