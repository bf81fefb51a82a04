import { describe, it, expect } from 'vitest';
import { formatTable, truncateString, writeTable } from '../cli/src/output/table';
import { omitNullValues, writeJSON } from '../cli/src/output/json';
import { writeDetails } from '../cli/src/output/detail';
import {
  firstNonEmpty,
  formatAnyValue,
  formatBool,
  formatDate,
  formatPolymorphic,
  formatRelated,
  formatTypeLabel
} from '../cli/src/output/format';
import { CapturedStream } from './helpers/io';

describe('table output', () => {
  it('pads every column but the last to its widest cell plus two', () => {
    expect(
      formatTable([
        ['ID', 'NAME', 'STATUS'],
        ['1', 'Bridge repair', 'active'],
        ['120', 'Road', '']
      ])
    ).toBe('ID   NAME           STATUS\n1    Bridge repair  active\n120  Road           \n');
  });

  it('truncates cells past their column limit', () => {
    const out = new CapturedStream();
    writeTable(
      out,
      [
        { header: 'ID', value: (row: { id: string; name: string }) => row.id },
        { header: 'NAME', value: (row: { id: string; name: string }) => row.name, maxWidth: 8 }
      ],
      [{ id: '1', name: 'A very long name' }]
    );
    expect(out.text).toBe('ID  NAME\n1   A ver...\n');
  });

  it('truncateString counts code points', () => {
    expect(truncateString('short', 10)).toBe('short');
    expect(truncateString('abcdefgh', 3)).toBe('abc');
    expect(truncateString('👍👍👍👍👍', 4)).toBe('👍...');
  });
});

describe('JSON output', () => {
  it('pretty prints with two-space indentation', () => {
    const out = new CapturedStream();
    writeJSON(out, { id: '1', tags: [] });
    expect(out.text).toBe('{\n  "id": "1",\n  "tags": []\n}\n');
  });

  it('drops null, empty strings and empty lists when asked', () => {
    expect(omitNullValues([{ id: '1', a: null, b: '', c: [], d: false, e: 0, f: { g: null, h: 'x' } }])).toEqual([
      { id: '1', d: false, e: 0, f: { h: 'x' } }
    ]);
  });
});

describe('detail output', () => {
  interface Detail {
    id: string;
    name: string;
    owner: string;
    project: string;
  }

  const layout = {
    fields: [
      { label: 'ID', value: (d: Detail) => d.id, always: true },
      { label: 'Name', value: (d: Detail) => d.name }
    ],
    sections: [
      {
        title: 'Relationships',
        fields: [
          { label: 'Owner', value: (d: Detail) => d.owner },
          { label: 'Project', value: (d: Detail) => d.project }
        ]
      }
    ]
  };

  it('prints non-empty fields and sections', () => {
    const out = new CapturedStream();
    writeDetails(out, layout, { id: '5', name: 'Grow', owner: 'Ada (7)', project: '' });
    expect(out.text).toBe(`ID: 5\nName: Grow\n\nRelationships:\n${'-'.repeat(40)}\n  Owner: Ada (7)\n`);
  });

  it('skips sections with nothing to show', () => {
    const out = new CapturedStream();
    writeDetails(out, layout, { id: '', name: '', owner: '', project: '' });
    expect(out.text).toBe('ID: \n');
  });
});

describe('value formatting', () => {
  it('firstNonEmpty trims and picks the first value', () => {
    expect(firstNonEmpty(' ', '', ' Ada ', 'Bob')).toBe('Ada');
    expect(firstNonEmpty()).toBe('');
  });

  it('formatRelated and formatPolymorphic handle missing parts', () => {
    expect(formatRelated('Ada', '7')).toBe('Ada (7)');
    expect(formatRelated('', '7')).toBe('7');
    expect(formatRelated('Ada', '')).toBe('Ada');
    expect(formatPolymorphic('brokers', '12')).toBe('brokers/12');
    expect(formatPolymorphic('', '')).toBe('');
  });

  it('formats dates, booleans and loose values', () => {
    expect(formatDate('2024-05-01T10:00:00Z')).toBe('2024-05-01');
    expect(formatDate('not a date')).toBe('not a date');
    expect(formatBool(true)).toBe('yes');
    expect(formatAnyValue(null)).toBe('');
    expect(formatAnyValue(12.5)).toBe('12.5');
    expect(formatAnyValue(['a', 'b'])).toBe('["a","b"]');
    expect(formatTypeLabel('material-suppliers')).toBe('MaterialSupplier');
  });

  it('labels organization types with their class names', () => {
    expect(formatTypeLabel('addresses')).toBe('Address');
    expect(formatTypeLabel('businesses')).toBe('Business');
    expect(formatTypeLabel('brokers')).toBe('Broker');
  });
});
