import { BirthdayCli, BirthdayCliDependencies, IConfigBirthdaySource } from './BirthdayCli';
import { USAGE } from './parseCliArgs';
import { HebrewDateCodec } from '../../../modules/hebrew-calendar/domain/services/HebrewDateCodec';
import { HebcalCalendarProvider } from '../../../modules/hebrew-calendar/adapters/HebcalCalendarProvider';
import { BirthdayOccurrenceFinder } from '../../../modules/birthdays/domain/services/BirthdayOccurrenceFinder';
import { ImportBirthdayRecordsUseCase } from '../../../modules/birthdays/application/use-cases/ImportBirthdayRecordsUseCase';
import { PlanBirthdayEventsUseCase } from '../../../modules/birthdays/application/use-cases/PlanBirthdayEventsUseCase';
import { IBirthdaySource } from '../../../modules/birthdays/application/ports/IBirthdaySource';
import { BirthdayRow } from '../../../modules/birthdays/application/types/BirthdayRow';
import { ConfigSettings } from '../../../shared/validation/schemas';
import { InfrastructureError } from '../../../domain/errors/InfrastructureError';

function inMemorySource(rows: BirthdayRow[]): IBirthdaySource {
  return { description: 'memory', load: async () => rows };
}

function inMemoryConfigSource(rows: BirthdayRow[], settings: ConfigSettings): IConfigBirthdaySource {
  return { ...inMemorySource(rows), readConfig: async () => ({ settings }) };
}

describe('BirthdayCli', () => {
  let out: string[];
  let err: string[];
  let deps: BirthdayCliDependencies;

  beforeEach(() => {
    out = [];
    err = [];
    const codec = new HebrewDateCodec(new HebcalCalendarProvider());
    deps = {
      codec,
      importUseCase: new ImportBirthdayRecordsUseCase(codec),
      planUseCase: new PlanBirthdayEventsUseCase(new BirthdayOccurrenceFinder(codec), codec),
      createCsvSource: jest.fn(() => inMemorySource([])),
      createConfigSource: jest.fn(() => inMemoryConfigSource([], { years_ahead: 5, start_year: null })),
      env: { NODE_ENV: 'test', BIRTHDAYS_CONFIG_PATH: 'config.json' },
      currentYear: 2025,
      out: (line) => out.push(line),
      err: (line) => err.push(line),
    };
  });

  describe('--test-conversion', () => {
    it('should print the reference conversions', async () => {
      // Act
      const exitCode = await new BirthdayCli(deps).run(['--test-conversion']);

      // Assert
      expect(exitCode).toBe(0);
      expect(out).toEqual([
        'Hebrew 15/1/5784 = Gregorian 2024-04-23',
        'Hebrew 1/7/5785 = Gregorian 2024-10-03',
        'Hebrew 10/7/5785 = Gregorian 2024-10-12',
      ]);
    });
  });

  describe('single birthday', () => {
    it('should print the Gregorian dates of the birthday', async () => {
      // Act
      const exitCode = await new BirthdayCli(deps).run([
        '--name',
        'Dana',
        '--hebrew-day',
        'א',
        '--hebrew-month',
        'תשרי',
        '--start-year',
        '2024',
        '--years',
        '3',
      ]);

      // Assert
      expect(exitCode).toBe(0);
      expect(out).toEqual([
        'Hebrew birthdays for 2024-2026',
        '',
        'Dana (1/7)',
        '  2024-10-03',
        '  2025-09-23',
        '  2026-09-12',
      ]);
      expect(err).toEqual([]);
    });

    it('should say so when the date never occurs in the span', async () => {
      // Arrange - 5785 and 5786 are both common years, so there is no Adar II in 2025
      const argv = ['--name', 'Avi', '--hebrew-day', '1', '--hebrew-month', 'אדר ב', '--years', '1'];

      // Act
      const exitCode = await new BirthdayCli(deps).run(argv);

      // Assert
      expect(exitCode).toBe(0);
      expect(out).toEqual(['Hebrew birthdays for 2025-2025', '', 'Avi (1/13)', '  (no occurrences)']);
    });
  });

  describe('--csv', () => {
    it('should plan the good rows and report the bad ones with exit code 1', async () => {
      // Arrange
      deps.createCsvSource = jest.fn(() =>
        inMemorySource([
          { source: 't.csv row 2', name: 'Noa', dayText: 'י', monthText: 'תשרי', yearText: '' },
          { source: 't.csv row 3', name: 'Gil', dayText: 'א', monthText: 'פברואר', yearText: '' },
        ])
      );

      // Act
      const exitCode = await new BirthdayCli(deps).run(['--csv', 't.csv', '--start-year', '2024', '--years', '1']);

      // Assert
      expect(exitCode).toBe(1);
      expect(deps.createCsvSource).toHaveBeenCalledWith('t.csv');
      expect(out).toEqual(['Hebrew birthdays for 2024-2024', '', 'Noa (10/7)', '  2024-10-12']);
      expect(err).toEqual(['', '1 record(s) failed:', '  t.csv row 3: Unknown Hebrew month name: "פברואר"']);
    });

    it('should read BIRTHDAY_CSV_PATH when no source flag is given', async () => {
      // Arrange
      deps.env = { ...deps.env, BIRTHDAY_CSV_PATH: 'from-env.csv' };

      // Act
      await new BirthdayCli(deps).run(['--years', '1']);

      // Assert
      expect(deps.createCsvSource).toHaveBeenCalledWith('from-env.csv');
      expect(deps.createConfigSource).not.toHaveBeenCalled();
    });

    it('should report an unreadable file as an error', async () => {
      // Arrange
      deps.createCsvSource = jest.fn(() => ({
        description: 'gone.csv',
        load: async (): Promise<BirthdayRow[]> => {
          throw new InfrastructureError('Cannot read gone.csv: no such file');
        },
      }));

      // Act
      const exitCode = await new BirthdayCli(deps).run(['--csv', 'gone.csv']);

      // Assert
      expect(exitCode).toBe(1);
      expect(err).toEqual(['Error: Cannot read gone.csv: no such file']);
    });

    it('should let unexpected errors through', async () => {
      // Arrange
      deps.createCsvSource = jest.fn(() => ({
        description: 'broken.csv',
        load: async (): Promise<BirthdayRow[]> => {
          throw new Error('boom');
        },
      }));

      // Act & Assert
      await expect(new BirthdayCli(deps).run(['--csv', 'broken.csv'])).rejects.toThrow('boom');
    });
  });

  describe('config file', () => {
    const rows: BirthdayRow[] = [{ source: 'config.json entry 1', name: 'Tal', dayText: '15', monthText: '1', yearText: '' }];

    it('should read the default path and take the span from the settings', async () => {
      // Arrange
      deps.createConfigSource = jest.fn(() => inMemoryConfigSource(rows, { years_ahead: 2, start_year: 2024 }));

      // Act
      const exitCode = await new BirthdayCli(deps).run([]);

      // Assert
      expect(exitCode).toBe(0);
      expect(deps.createConfigSource).toHaveBeenCalledWith('config.json');
      expect(out).toEqual(['Hebrew birthdays for 2024-2025', '', 'Tal (15/1)', '  2024-04-23', '  2025-04-13']);
    });

    it('should let flags override the settings', async () => {
      // Arrange
      deps.createConfigSource = jest.fn(() => inMemoryConfigSource(rows, { years_ahead: 2, start_year: 2024 }));

      // Act
      await new BirthdayCli(deps).run(['--config', 'other.json', '--start-year', '2025', '--years', '1']);

      // Assert
      expect(deps.createConfigSource).toHaveBeenCalledWith('other.json');
      expect(out).toEqual(['Hebrew birthdays for 2025-2025', '', 'Tal (15/1)', '  2025-04-13']);
    });

    it('should let YEARS_AHEAD override the settings and fall back to the current year', async () => {
      // Arrange
      deps.env = { ...deps.env, YEARS_AHEAD: 1 };
      deps.createConfigSource = jest.fn(() => inMemoryConfigSource(rows, { years_ahead: 4, start_year: null }));

      // Act
      await new BirthdayCli(deps).run([]);

      // Assert
      expect(out[0]).toBe('Hebrew birthdays for 2025-2025');
    });
  });

  describe('invalid arguments', () => {
    it('should print the problem and exit with 1', async () => {
      // Act
      const exitCode = await new BirthdayCli(deps).run(['--name', 'Dana']);

      // Assert
      expect(exitCode).toBe(1);
      expect(out).toEqual([]);
      expect(err).toEqual(['Error: --name, --hebrew-day and --hebrew-month must be given together']);
    });
  });

  it('should print usage for --help', async () => {
    // Act
    const exitCode = await new BirthdayCli(deps).run(['--help']);

    // Assert
    expect(exitCode).toBe(0);
    expect(out).toEqual([USAGE]);
    expect(USAGE.startsWith('Usage: hebrew-birthdays [options]\n')).toBe(true);
  });
});
