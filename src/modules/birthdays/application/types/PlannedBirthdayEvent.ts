import { GregorianDate } from '../../../hebrew-calendar/domain/value-objects/GregorianDate';

/**
 * An all-day calendar event for one birthday occurrence, ready to be handed to a
 * calendar client
 */
export interface PlannedBirthdayEvent {
  name: string;
  date: GregorianDate;
  title: string;
  description: string;

  /** Age reached on this birthday; null when the birth year is unknown */
  age: number | null;
}
