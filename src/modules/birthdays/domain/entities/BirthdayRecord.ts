import { isHebrewMonth } from '../../../hebrew-calendar/domain/value-objects/HebrewMonth';
import { MalformedInputError } from '../../../../domain/errors/MalformedInputError';

export interface BirthdayRecordProps {
  name: string;
  hebrewMonth: number;
  hebrewDay: number;
  /** Hebrew year of birth, kept only to number the birthdays */
  hebrewBirthYear?: number | null;
}

/**
 * BirthdayRecord entity
 * A person's recurring Hebrew birthday: the (month, day) that repeats every year,
 * plus the birth year when the source provided one
 */
export class BirthdayRecord {
  public readonly name: string;
  public readonly hebrewMonth: number;
  public readonly hebrewDay: number;
  public readonly hebrewBirthYear: number | null;

  public constructor(props: BirthdayRecordProps) {
    const name = props.name.trim();
    if (name.length === 0) {
      throw new MalformedInputError('Name cannot be empty');
    }
    if (!isHebrewMonth(props.hebrewMonth)) {
      throw new MalformedInputError(`Hebrew month must be an integer from 1 to 13, got ${props.hebrewMonth}`);
    }
    if (!Number.isInteger(props.hebrewDay) || props.hebrewDay < 1 || props.hebrewDay > 30) {
      throw new MalformedInputError(`Hebrew day must be an integer from 1 to 30, got ${props.hebrewDay}`);
    }
    const birthYear = props.hebrewBirthYear ?? null;
    if (birthYear !== null && (!Number.isInteger(birthYear) || birthYear < 1)) {
      throw new MalformedInputError(`Hebrew birth year must be a positive integer, got ${birthYear}`);
    }

    this.name = name;
    this.hebrewMonth = props.hebrewMonth;
    this.hebrewDay = props.hebrewDay;
    this.hebrewBirthYear = birthYear;
  }

  /**
   * Age reached on the birthday that falls in the given Hebrew year,
   * or null when the birth year is unknown
   */
  public ageInHebrewYear(hebrewYear: number): number | null {
    if (this.hebrewBirthYear === null) {
      return null;
    }
    return hebrewYear - this.hebrewBirthYear;
  }

  /**
   * Returns "name (day/month)"
   */
  public toString(): string {
    return `${this.name} (${this.hebrewDay}/${this.hebrewMonth})`;
  }
}
