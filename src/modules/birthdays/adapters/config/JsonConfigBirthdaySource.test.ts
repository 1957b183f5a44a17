import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { JsonConfigBirthdaySource, configEntriesToRows, parseBirthdaysConfig } from './JsonConfigBirthdaySource';
import { InfrastructureError } from '../../../../domain/errors/InfrastructureError';
import { MalformedInputError } from '../../../../domain/errors/MalformedInputError';

describe('parseBirthdaysConfig', () => {
  it('should fill in default settings', () => {
    // Act
    const config = parseBirthdaysConfig('{"hebrew_birthdays": []}', 'config.json');

    // Assert
    expect(config).toEqual({
      hebrew_birthdays: [],
      settings: { years_ahead: 5, start_year: null },
    });
  });

  it('should default a missing birthdays list to empty', () => {
    // Act
    const config = parseBirthdaysConfig('{"settings": {"years_ahead": 3, "start_year": 2030}}', 'config.json');

    // Assert
    expect(config.hebrew_birthdays).toEqual([]);
    expect(config.settings.years_ahead).toBe(3);
    expect(config.settings.start_year).toBe(2030);
  });

  it('should reject text that is not JSON', () => {
    // Act & Assert
    expect(() => parseBirthdaysConfig('{ nope', 'config.json')).toThrow(InfrastructureError);
    expect(() => parseBirthdaysConfig('{ nope', 'config.json')).toThrow(/^Invalid JSON in config\.json: /);
  });

  it('should reject invalid settings', () => {
    // Act & Assert
    expect(() => parseBirthdaysConfig('{"settings": {"years_ahead": 0}}', 'config.json')).toThrow(MalformedInputError);
  });
});

describe('configEntriesToRows', () => {
  it('should turn numeric entries into digit text', () => {
    // Arrange
    const config = parseBirthdaysConfig(
      JSON.stringify({
        hebrew_birthdays: [
          { name: 'Dana', hebrew_day: 15, hebrew_month: 7, hebrew_year: 5750 },
          { name: 'Yoni', hebrew_day: 1, hebrew_month: 13 },
        ],
      }),
      'config.json'
    );

    // Act
    const rows = configEntriesToRows(config, 'config.json');

    // Assert
    expect(rows).toEqual([
      { source: 'config.json entry 1', name: 'Dana', dayText: '15', monthText: '7', yearText: '5750' },
      { source: 'config.json entry 2', name: 'Yoni', dayText: '1', monthText: '13', yearText: '' },
    ]);
  });

  it('should keep a malformed entry as a row of whatever fields it has', () => {
    // Arrange
    const config = parseBirthdaysConfig(
      JSON.stringify({ hebrew_birthdays: [{ name: 'Noa', hebrew_day: 31, hebrew_month: 7 }, 'oops'] }),
      'config.json'
    );

    // Act
    const rows = configEntriesToRows(config, 'config.json');

    // Assert
    expect(rows).toEqual([
      { source: 'config.json entry 1', name: 'Noa', dayText: '31', monthText: '7', yearText: '' },
      { source: 'config.json entry 2', name: '', dayText: '', monthText: '', yearText: '' },
    ]);
  });
});

describe('JsonConfigBirthdaySource', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'birthdays-config-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('should load rows and settings from disk', async () => {
    // Arrange
    const filePath = join(directory, 'config.json');
    await writeFile(
      filePath,
      JSON.stringify({
        hebrew_birthdays: [{ name: 'Tal', hebrew_day: 10, hebrew_month: 1 }],
        settings: { years_ahead: 2, start_year: 2025 },
      }),
      'utf-8'
    );
    const source = new JsonConfigBirthdaySource(filePath);

    // Act
    const rows = await source.load();
    const config = await source.readConfig();

    // Assert
    expect(rows).toEqual([{ source: `${filePath} entry 1`, name: 'Tal', dayText: '10', monthText: '1', yearText: '' }]);
    expect(config.settings).toEqual({ years_ahead: 2, start_year: 2025 });
  });

  it('should wrap a missing file in InfrastructureError', async () => {
    // Arrange
    const source = new JsonConfigBirthdaySource(join(directory, 'absent.json'));

    // Act & Assert
    await expect(source.load()).rejects.toThrow(InfrastructureError);
  });
});
