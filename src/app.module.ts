import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import appConfig from './config/app.config';
import recurrenceConfig from './recurrence/config/recurrence.config';
import { RecurrenceModule } from './recurrence/recurrence.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig, recurrenceConfig],
      envFilePath: ['.env'],
    }),
    RecurrenceModule,
  ],
})
export class AppModule {}
