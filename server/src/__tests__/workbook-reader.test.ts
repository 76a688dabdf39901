import { describe, it, expect } from 'vitest';
import {
  ABSENT_CELL,
  readSurveyWorkbook,
  renderBodyCell,
  renderHeaderCell,
} from '../survey/workbook-reader.js';
import { CoercionError } from '../lib/errors.js';
import { buildWorkbook } from './helpers/survey-fixture.js';

describe('renderBodyCell', () => {
  it('renders empty cells as the absence value', () => {
    expect(renderBodyCell(null, 1)).toBe(ABSENT_CELL);
    expect(renderBodyCell(undefined, 1)).toBe('None');
  });

  it('trims strings and stringifies numbers and booleans', () => {
    expect(renderBodyCell('  Yes  ', 1)).toBe('Yes');
    expect(renderBodyCell(42, 1)).toBe('42');
    expect(renderBodyCell(true, 1)).toBe('true');
  });

  it('renders dates as YYYY-MM-DD', () => {
    expect(renderBodyCell(new Date(Date.UTC(2023, 0, 9)), 1)).toBe('2023-01-09');
  });

  it('joins rich text runs', () => {
    expect(renderBodyCell({ richText: [{ text: 'Model-' }, { text: 'Based Design ' }] }, 1)).toBe('Model-Based Design');
  });

  it('uses the text of a hyperlink', () => {
    expect(renderBodyCell({ text: 'profile', hyperlink: 'https://example.com/p/1' }, 1)).toBe('profile');
  });

  it('uses the cached result of a formula', () => {
    expect(renderBodyCell({ formula: 'A1', result: '5 to 9', date1904: false }, 1)).toBe('5 to 9');
    expect(renderBodyCell({ formula: 'A1', date1904: false }, 1)).toBe('None');
  });

  it('throws a CoercionError for error cells', () => {
    expect(() => renderBodyCell({ error: '#N/A' }, 4)).toThrow(CoercionError);
    expect(() => renderBodyCell({ error: '#N/A' }, 4)).toThrow('Cell in column 4 holds error #N/A');
  });
});

describe('renderHeaderCell', () => {
  it('replaces non-breaking spaces and leaves empty headers blank', () => {
    expect(renderHeaderCell('Work\u00a0Experience', 1)).toBe('Work Experience');
    expect(renderHeaderCell(null, 2)).toBe('');
  });
});

describe('readSurveyWorkbook', () => {
  it('reads headers and string rows from the first worksheet', async () => {
    const bytes = await buildWorkbook(
      ['ID', 'Work\u00a0Experience', 'Start Date', 'Notes'],
      [
        ['1001', '5 to 9', new Date(Date.UTC(2023, 0, 9)), '  padded  '],
        [42, null, null, 'x'],
      ],
    );

    const sheet = await readSurveyWorkbook(bytes);
    expect(sheet.headers).toEqual(['ID', 'Work Experience', 'Start Date', 'Notes']);
    expect(sheet.rows).toEqual([
      ['1001', '5 to 9', '2023-01-09', 'padded'],
      ['42', 'None', 'None', 'x'],
    ]);
    expect(sheet.rowIndices).toEqual([0, 1]);
    expect(sheet.issues).toEqual([]);
  });

  it('leaves out rows holding error cells and keeps the sheet position of the rest', async () => {
    const bytes = await buildWorkbook(
      ['ID', 'Name'],
      [['1', 'Ann'], ['2', { error: '#N/A' }], ['3', 'Cy']],
    );

    const sheet = await readSurveyWorkbook(bytes);
    expect(sheet.rows).toEqual([['1', 'Ann'], ['3', 'Cy']]);
    expect(sheet.rowIndices).toEqual([0, 2]);
    expect(sheet.issues).toEqual([
      { rowIndex: 1, kind: 'shape', message: 'Cell in column 2 holds error #N/A' },
    ]);
  });

  it('pads short rows to the header width', async () => {
    const bytes = await buildWorkbook(['ID', 'Name', 'Other Tools'], [['7']]);
    const sheet = await readSurveyWorkbook(bytes);
    expect(sheet.rows).toEqual([['7', 'None', 'None']]);
  });

  it('rejects bytes that are not a workbook', async () => {
    await expect(readSurveyWorkbook(Buffer.from('not a workbook'))).rejects.toBeInstanceOf(CoercionError);
  });
});
