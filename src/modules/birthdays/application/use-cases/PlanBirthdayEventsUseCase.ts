import { HebrewDateCodec } from '../../../hebrew-calendar/domain/services/HebrewDateCodec';
import { GregorianDate } from '../../../hebrew-calendar/domain/value-objects/GregorianDate';
import { BirthdayOccurrenceFinder } from '../../domain/services/BirthdayOccurrenceFinder';
import { BirthdayRecord } from '../../domain/entities/BirthdayRecord';
import { PlanBirthdayEventsDTO } from '../dtos/PlanBirthdayEventsDTO';
import { PlannedBirthdayEvent } from '../types/PlannedBirthdayEvent';
import { RecordFailure, toRecordFailure } from '../types/RecordFailure';
import { YearSpan, YearSpanSchema } from '../../../../shared/validation/schemas';
import { parseWithSchema } from '../../../../shared/validation/parseWithSchema';
import { MalformedInputError } from '../../../../domain/errors/MalformedInputError';
import { logger } from '../../../../shared/logger';

export interface PlanBirthdayEventsResult {
  events: PlannedBirthdayEvent[];
  failures: RecordFailure[];
}

/**
 * Use Case: Plan the calendar events of a set of Hebrew birthdays
 *
 * For every record, finds the Gregorian date of its Hebrew (month, day) in each year of
 * the span and drafts an all-day event:
 * - title: "<name>'s Hebrew Birthday"
 * - description: "<age> Birthday of <name>" (when the birth year is known), the Hebrew
 *   day/month and the Gregorian date
 *
 * Events come out grouped by record, each group in date order. A record that fails
 * (MalformedInputError) is reported in `failures` and the rest are still planned.
 *
 * @throws MalformedInputError if the year span itself is invalid
 */
export class PlanBirthdayEventsUseCase {
  public constructor(
    private readonly finder: BirthdayOccurrenceFinder,
    private readonly codec: HebrewDateCodec
  ) {}

  public execute(dto: PlanBirthdayEventsDTO): PlanBirthdayEventsResult {
    const span = this.validateSpan(dto);
    const events: PlannedBirthdayEvent[] = [];
    const failures: RecordFailure[] = [];

    for (const record of dto.records) {
      try {
        events.push(...this.planRecord(record, span));
      } catch (error) {
        if (!(error instanceof MalformedInputError)) {
          throw error;
        }
        const failure = toRecordFailure(record.toString(), error);
        failures.push(failure);
        logger.warn({ msg: 'Could not plan birthday', ...failure });
      }
    }

    logger.info({
      msg: 'Planned birthday events',
      records: dto.records.length,
      events: events.length,
      failed: failures.length,
      startYear: span.startYear,
      yearCount: span.yearCount,
    });

    return { events, failures };
  }

  private planRecord(record: BirthdayRecord, span: YearSpan): PlannedBirthdayEvent[] {
    const occurrences = this.finder.findOccurrences(
      record.hebrewMonth,
      record.hebrewDay,
      span.startYear,
      span.yearCount
    );

    return occurrences.map((date) => this.toEvent(record, date));
  }

  private toEvent(record: BirthdayRecord, date: GregorianDate): PlannedBirthdayEvent {
    const age = record.ageInHebrewYear(this.codec.toHebrew(date).year);
    const lines = [
      `Hebrew birthday: ${record.hebrewDay}/${record.hebrewMonth}`,
      `Gregorian date: ${date.toISODate()}`,
    ];
    if (age !== null && age > 0) {
      lines.unshift(`${age} Birthday of ${record.name}`);
    }

    return {
      name: record.name,
      date,
      title: `${record.name}'s Hebrew Birthday`,
      description: lines.join('\n'),
      age,
    };
  }

  private validateSpan(dto: PlanBirthdayEventsDTO): YearSpan {
    return parseWithSchema(YearSpanSchema, { startYear: dto.startYear, yearCount: dto.yearCount });
  }
}
