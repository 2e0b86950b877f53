import * as XLSX from 'xlsx';
import { describe, expect, it } from 'vitest';
import { DataProcessor, inferColumnType } from './dataProcessor';
import { DataLoadError } from './errors';

const csv = (text: string) => Buffer.from(text, 'utf8');

function loadError(text: string): unknown {
  try {
    DataProcessor.processCsvBuffer(csv(text), 'data.csv');
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('DataProcessor.processCsvBuffer', () => {
  it('reports row and column counts of a valid CSV', () => {
    const dataset = DataProcessor.processCsvBuffer(
      csv('name,age,score\nalice,30,1.5\nbob,25,2\n'),
      'people.csv'
    );

    expect(dataset.rowCount).toBe(2);
    expect(dataset.columnCount).toBe(3);
    expect(dataset.headers).toEqual(['name', 'age', 'score']);
    expect(dataset.columnTypes).toEqual(['string', 'integer', 'float']);
    expect(dataset.data).toEqual([
      ['alice', 30, 1.5],
      ['bob', 25, 2],
    ]);
    expect(dataset.source).toBe('csv');
    expect(dataset.originalName).toBe('people.csv');
  });

  it('drops a byte order mark before the header', () => {
    const dataset = DataProcessor.processCsvBuffer(csv('\uFEFFid,value\n1,x\n'), 'bom.csv');
    expect(dataset.headers).toEqual(['id', 'value']);
  });

  it('pads short rows with nulls', () => {
    const dataset = DataProcessor.processCsvBuffer(csv('a,b\n1\n2,3\n'), 'short.csv');
    expect(dataset.data).toEqual([
      [1, null],
      [2, 3],
    ]);
    expect(dataset.columnTypes).toEqual(['integer', 'integer']);
  });

  it('treats common missing-value spellings as null', () => {
    const dataset = DataProcessor.processCsvBuffer(csv('x,y\nNA,foo\n3,\n'), 'missing.csv');
    expect(dataset.data).toEqual([
      [null, 'foo'],
      [3, null],
    ]);
    expect(dataset.columnTypes).toEqual(['integer', 'string']);
  });

  it('rejects rows wider than the header', () => {
    const caught = loadError('a,b\n1,2,3\n');
    expect(caught).toBeInstanceOf(DataLoadError);
    expect(caught).toMatchObject({
      status: 400,
      details: 'Error tokenizing data. Expected 2 fields in line 2, saw 3',
    });
  });

  it('counts blank lines when reporting the line of a wide row', () => {
    expect(loadError('a,b\n\n1,2,3\n')).toMatchObject({
      details: 'Error tokenizing data. Expected 2 fields in line 3, saw 3',
    });
  });

  it('counts line breaks inside quoted fields when reporting lines', () => {
    expect(loadError('a,b\n"x\ny",1\n1,2,3\n')).toMatchObject({
      details: 'Error tokenizing data. Expected 2 fields in line 4, saw 3',
    });
  });

  it('keeps numerals that overflow to Infinity as text', () => {
    const dataset = DataProcessor.processCsvBuffer(csv('v\n1\n2\n1e400\n'), 'overflow.csv');

    expect(dataset.columnTypes).toEqual(['string']);
    expect(dataset.data).toEqual([['1'], ['2'], ['1e400']]);
  });

  it('keeps integers beyond the safe range as text', () => {
    const dataset = DataProcessor.processCsvBuffer(
      csv('id\n12345678901234567891\n9007199254740993\n'),
      'ids.csv'
    );

    expect(dataset.columnTypes).toEqual(['string']);
    expect(dataset.data).toEqual([['12345678901234567891'], ['9007199254740993']]);
  });

  it('rejects a header without data rows', () => {
    expect(() => DataProcessor.processCsvBuffer(csv('a,b\n'), 'empty.csv')).toThrow('The data is empty.');
  });

  it('rejects an empty file', () => {
    expect(() => DataProcessor.processCsvBuffer(csv(''), 'blank.csv')).toThrow(DataLoadError);
  });
});

describe('DataProcessor.processExcelBuffer', () => {
  it('reads the first worksheet', () => {
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(
      workbook,
      XLSX.utils.aoa_to_sheet([
        ['city', 'temp'],
        ['Oslo', 10],
        ['Rome', 2.5],
      ]),
      'Data'
    );
    const buffer: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });

    const dataset = DataProcessor.processExcelBuffer(buffer, 'weather.xlsx');

    expect(dataset.source).toBe('excel');
    expect(dataset.sheetName).toBe('Data');
    expect(dataset.headers).toEqual(['city', 'temp']);
    expect(dataset.columnTypes).toEqual(['string', 'float']);
    expect(dataset.data).toEqual([
      ['Oslo', 10],
      ['Rome', 2.5],
    ]);
  });
});

describe('DataProcessor.processRows', () => {
  it('widens the header when rows carry extra cells', () => {
    const dataset = DataProcessor.processRows(
      [
        ['a', 'b'],
        ['1', '2', 'extra'],
      ],
      { originalName: 'sheet', source: 'google-sheet' }
    );
    expect(dataset.headers).toEqual(['a', 'b', 'Unnamed: 2']);
    expect(dataset.data).toEqual([[1, 2, 'extra']]);
  });
});

describe('DataProcessor.normalizeHeaders', () => {
  it('names blank headers and suffixes duplicates', () => {
    expect(DataProcessor.normalizeHeaders(['a', '', 'a', 'a'])).toEqual(['a', 'Unnamed: 1', 'a.1', 'a.2']);
  });
});

describe('inferColumnType', () => {
  it('distinguishes integers, floats and text', () => {
    expect(inferColumnType(['1', '-2', null])).toBe('integer');
    expect(inferColumnType(['1', '2.5', '1e3'])).toBe('float');
    expect(inferColumnType(['1', 'two'])).toBe('string');
    expect(inferColumnType([null, null])).toBe('string');
    expect(inferColumnType(['9007199254740991'])).toBe('integer');
    expect(inferColumnType(['9007199254740992'])).toBe('string');
    expect(inferColumnType(['1.5', '1e400'])).toBe('string');
  });
});

describe('DataProcessor helpers', () => {
  const dataset = DataProcessor.processCsvBuffer(
    csv('name,age\nAda,36\nGrace,45\nLinus,28\n'),
    'people.csv'
  );

  it('describes the dataset for the LLM', () => {
    expect(DataProcessor.optimizeDataForLLM(dataset)).toBe(
      'Analyzing a dataset with 3 rows and columns: name, age.'
    );
  });

  it('previews the first rows as records', () => {
    expect(DataProcessor.preview(dataset, 2)).toEqual([
      { name: 'Ada', age: 36 },
      { name: 'Grace', age: 45 },
    ]);
  });

  it('lists numeric columns', () => {
    expect(DataProcessor.numericColumns(dataset)).toEqual(['age']);
  });

  it('computes stats with columns and row count', () => {
    const stats = DataProcessor.computeStats(dataset);
    expect(stats.columns).toEqual(['name', 'age']);
    expect(stats.rows).toBe(3);
    // widest cell is the mean, 36.333333
    expect(stats.summary.split('\n')[0]).toBe(' '.repeat(13) + 'age');
  });
});
