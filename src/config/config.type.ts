import { AppConfig } from './app-config.type';
import { RecurrenceConfig } from '../recurrence/config/recurrence-config.type';

export type AllConfigType = {
  app: AppConfig;
  recurrence: RecurrenceConfig;
};
