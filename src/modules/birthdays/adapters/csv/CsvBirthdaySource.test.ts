import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { CsvBirthdaySource, parseBirthdayCsv } from './CsvBirthdaySource';
import { InfrastructureError } from '../../../../domain/errors/InfrastructureError';

describe('parseBirthdayCsv', () => {
  it('should map Hebrew column headers to rows labelled by spreadsheet row', async () => {
    // Arrange
    const content = 'שם,יום,חודש,שנה\nDana Levi,כ"ט,אדר א\',תשס"ה\nYoni,ט"ו,שבט,\n';

    // Act
    const rows = await parseBirthdayCsv(content, 'test.csv');

    // Assert
    expect(rows).toEqual([
      { source: 'test.csv row 2', name: 'Dana Levi', dayText: 'כ"ט', monthText: "אדר א'", yearText: 'תשס"ה' },
      { source: 'test.csv row 3', name: 'Yoni', dayText: 'ט"ו', monthText: 'שבט', yearText: '' },
    ]);
  });

  it('should strip a byte order mark and skip empty lines', async () => {
    // Arrange
    const content = '﻿שם,יום,חודש,שנה\n\nNoa,10,7,5785\n\n';

    // Act
    const rows = await parseBirthdayCsv(content, 'export.csv');

    // Assert
    expect(rows).toEqual([
      { source: 'export.csv row 3', name: 'Noa', dayText: '10', monthText: '7', yearText: '5785' },
    ]);
  });

  it('should keep a row with missing cells so the other rows still load', async () => {
    // Arrange
    const content = 'שם,יום,חודש,שנה\nDana,א,ניסן,5784\nYoni,א\nNoa,י,תשרי,5785\n';

    // Act
    const rows = await parseBirthdayCsv(content, 'b.csv');

    // Assert
    expect(rows).toEqual([
      { source: 'b.csv row 2', name: 'Dana', dayText: 'א', monthText: 'ניסן', yearText: '5784' },
      { source: 'b.csv row 3', name: 'Yoni', dayText: 'א', monthText: '', yearText: '' },
      { source: 'b.csv row 4', name: 'Noa', dayText: 'י', monthText: 'תשרי', yearText: '5785' },
    ]);
  });

  it('should label rows after a blank line with their line in the file', async () => {
    // Arrange
    const content = 'שם,יום,חודש,שנה\nDana,א,ניסן,\n\nNoa,ל,כסלו,5784\n';

    // Act
    const rows = await parseBirthdayCsv(content, 'e.csv');

    // Assert
    expect(rows.map((row) => row.source)).toEqual(['e.csv row 2', 'e.csv row 4']);
  });

  it('should accept a file without the year column', async () => {
    // Arrange
    const content = 'שם,יום,חודש\nTal,א,תשרי\n';

    // Act
    const rows = await parseBirthdayCsv(content, 'short.csv');

    // Assert
    expect(rows).toEqual([{ source: 'short.csv row 2', name: 'Tal', dayText: 'א', monthText: 'תשרי', yearText: '' }]);
  });

  it('should return no rows for a header-only file', async () => {
    // Act
    const rows = await parseBirthdayCsv('שם,יום,חודש,שנה\n', 'empty.csv');

    // Assert
    expect(rows).toEqual([]);
  });

  it('should reject a file missing a required column', async () => {
    // Arrange
    const content = 'name,יום,חודש\nTal,א,תשרי\n';

    // Act & Assert
    await expect(parseBirthdayCsv(content, 'wrong.csv')).rejects.toThrow(InfrastructureError);
    await expect(parseBirthdayCsv(content, 'wrong.csv')).rejects.toThrow('wrong.csv is missing column(s): שם');
  });
});

describe('CsvBirthdaySource', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'birthdays-csv-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('should load rows from a file on disk', async () => {
    // Arrange
    const filePath = join(directory, 'birthdays.csv');
    await writeFile(filePath, 'שם,יום,חודש,שנה\nAvi,א,ניסן,תשפ"ה\n', 'utf-8');
    const source = new CsvBirthdaySource(filePath);

    // Act
    const rows = await source.load();

    // Assert
    expect(source.description).toBe(filePath);
    expect(rows).toEqual([
      { source: `${filePath} row 2`, name: 'Avi', dayText: 'א', monthText: 'ניסן', yearText: 'תשפ"ה' },
    ]);
  });

  it('should wrap a missing file in InfrastructureError', async () => {
    // Arrange
    const filePath = join(directory, 'missing.csv');
    const source = new CsvBirthdaySource(filePath);

    // Act & Assert
    await expect(source.load()).rejects.toThrow(InfrastructureError);
    await expect(source.load()).rejects.toThrow(`Cannot read ${filePath}`);
  });
});
