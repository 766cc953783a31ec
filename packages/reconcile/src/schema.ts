import { SchemaMismatchError } from './errors';
import type { Registrant, Table } from './types';

export interface ColumnOverrides {
  emailColumn?: string;
  nameColumn?: string;
}

export interface ResolvedColumns {
  emailColumn: string;
  nameColumn?: string;
}

/**
 * Picks the email and name columns of a registration table.
 *
 * Without an override the email column is the single header containing "email"
 * (case-insensitive); none or several such headers is a mismatch. The name column is the
 * header "Name" in any case, and optional.
 */
export function resolveColumns(columns: readonly string[], overrides: ColumnOverrides = {}): ResolvedColumns {
  const available = [...columns];

  let emailColumn: string;
  if (overrides.emailColumn) {
    if (!columns.includes(overrides.emailColumn)) {
      throw new SchemaMismatchError(
        `Email column "${overrides.emailColumn}" not found. Available columns: ${available.join(', ')}`,
        available
      );
    }
    emailColumn = overrides.emailColumn;
  } else {
    const candidates = columns.filter((column) => column.toLowerCase().includes('email'));
    if (candidates.length === 0) {
      throw new SchemaMismatchError(
        `Could not find an email column. Available columns: ${available.join(', ')}`,
        available
      );
    }
    if (candidates.length > 1) {
      throw new SchemaMismatchError(
        `Several columns look like email columns (${candidates.join(', ')}); pick one with --email-column`,
        candidates
      );
    }
    emailColumn = candidates[0];
  }

  let nameColumn: string | undefined;
  if (overrides.nameColumn) {
    if (!columns.includes(overrides.nameColumn)) {
      throw new SchemaMismatchError(
        `Name column "${overrides.nameColumn}" not found. Available columns: ${available.join(', ')}`,
        available
      );
    }
    nameColumn = overrides.nameColumn;
  } else {
    nameColumn = columns.find((column) => column.trim().toLowerCase() === 'name');
  }

  return nameColumn === undefined ? { emailColumn } : { emailColumn, nameColumn };
}

export function toRegistrants(table: Table, columns: ResolvedColumns): Registrant[] {
  return table.rows.map((record, idx) => ({
    rowNumber: idx + 1,
    name: columns.nameColumn ? record[columns.nameColumn] ?? '' : '',
    email: record[columns.emailColumn] ?? '',
    record,
  }));
}
