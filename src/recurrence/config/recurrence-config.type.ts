export type RecurrenceConfig = {
  defaultOccurrenceCount: number;
  maxOccurrenceCount: number;
  maxRepeatCount: number;
};
