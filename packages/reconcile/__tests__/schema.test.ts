/**
 * @jest-environment node
 */

import { SchemaMismatchError } from '../src/errors';
import { resolveColumns, toRegistrants } from '../src/schema';

describe('resolveColumns', () => {
  it('finds the single header mentioning email, in any case', () => {
    expect(resolveColumns(['Name', 'E-mail', 'Primary EMAIL Address'])).toEqual({
      emailColumn: 'Primary EMAIL Address',
      nameColumn: 'Name',
    });
  });

  it('matches the name column case-insensitively and allows it to be missing', () => {
    expect(resolveColumns(['NAME', 'Email'])).toEqual({ emailColumn: 'Email', nameColumn: 'NAME' });
    expect(resolveColumns(['Email', 'Team'])).toEqual({ emailColumn: 'Email' });
  });

  it('rejects a table without an email column', () => {
    expect(() => resolveColumns(['Name', 'Team'])).toThrow(SchemaMismatchError);
    expect(() => resolveColumns(['Name', 'Team'])).toThrow(
      'Could not find an email column. Available columns: Name, Team'
    );
  });

  it('rejects several email-like columns', () => {
    try {
      resolveColumns(['Email', 'Confirm Email']);
      throw new Error('expected a mismatch');
    } catch (error) {
      if (!(error instanceof SchemaMismatchError)) throw error;
      expect(error.columns).toEqual(['Email', 'Confirm Email']);
      expect(error.message).toBe(
        'Several columns look like email columns (Email, Confirm Email); pick one with --email-column'
      );
    }
  });

  it('uses explicit overrides', () => {
    expect(
      resolveColumns(['Email', 'Confirm Email', 'Full name'], { emailColumn: 'Confirm Email', nameColumn: 'Full name' })
    ).toEqual({ emailColumn: 'Confirm Email', nameColumn: 'Full name' });
  });

  it('rejects overrides that do not exist', () => {
    expect(() => resolveColumns(['Email'], { emailColumn: 'Mail' })).toThrow(SchemaMismatchError);
    expect(() => resolveColumns(['Email'], { nameColumn: 'Who' })).toThrow(SchemaMismatchError);
  });
});

describe('toRegistrants', () => {
  it('numbers rows from 1 and keeps the full record', () => {
    const table = {
      columns: ['Name', 'Email', 'Team'],
      rows: [
        { Name: 'Ada Lovelace', Email: 'ada@example.com', Team: 'Blue' },
        { Name: 'Grace', Email: '', Team: 'Red' },
      ],
    };

    const registrants = toRegistrants(table, { emailColumn: 'Email', nameColumn: 'Name' });

    expect(registrants).toEqual([
      { rowNumber: 1, name: 'Ada Lovelace', email: 'ada@example.com', record: table.rows[0] },
      { rowNumber: 2, name: 'Grace', email: '', record: table.rows[1] },
    ]);
  });

  it('uses empty names when there is no name column', () => {
    const registrants = toRegistrants(
      { columns: ['Email'], rows: [{ Email: 'a@x.com' }] },
      { emailColumn: 'Email' }
    );
    expect(registrants[0].name).toBe('');
  });
});
