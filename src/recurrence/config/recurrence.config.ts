import { registerAs } from '@nestjs/config';
import { IsInt, IsOptional, Max, Min } from 'class-validator';
import validateConfig from '../../utils/validate-config';
import {
  DEFAULT_OCCURRENCE_COUNT,
  MAX_OCCURRENCE_COUNT,
  MAX_REPEAT_COUNT,
} from '../constants/recurrence.constants';
import { RecurrenceConfig } from './recurrence-config.type';

class EnvironmentVariablesValidator {
  @IsInt()
  @Min(1)
  @IsOptional()
  RECURRENCE_DEFAULT_OCCURRENCE_COUNT?: number;

  @IsInt()
  @Min(1)
  @IsOptional()
  RECURRENCE_MAX_OCCURRENCE_COUNT?: number;

  @IsInt()
  @Min(1)
  @Max(MAX_REPEAT_COUNT)
  @IsOptional()
  RECURRENCE_MAX_REPEAT_COUNT?: number;
}

export default registerAs<RecurrenceConfig>('recurrence', () => {
  validateConfig(process.env, EnvironmentVariablesValidator);

  return {
    defaultOccurrenceCount: parseInt(
      process.env.RECURRENCE_DEFAULT_OCCURRENCE_COUNT ||
        String(DEFAULT_OCCURRENCE_COUNT),
      10,
    ),
    maxOccurrenceCount: parseInt(
      process.env.RECURRENCE_MAX_OCCURRENCE_COUNT ||
        String(MAX_OCCURRENCE_COUNT),
      10,
    ),
    maxRepeatCount: parseInt(
      process.env.RECURRENCE_MAX_REPEAT_COUNT || String(MAX_REPEAT_COUNT),
      10,
    ),
  };
});
