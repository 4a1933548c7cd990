/**
 * Raised when free text cannot be turned into a date or schedule.
 * The message is meant to be shown to the user as is.
 */
export class DateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DateError';
  }
}
