/**
 * Plain-text rendering of stored pricing records
 */

import type { PricingRecord } from '../types/index.js';

export const EMPTY_TABLE_MESSAGE = 'No pricing data stored yet.';

const COLUMNS = [
  'ID',
  'Company',
  'Plan',
  'Input/1M',
  'Output/1M',
  'Currency',
  'Billing',
  'Recorded',
];

export function formatCost(value: number | null): string {
  return value === null ? '-' : String(value);
}

function toCells(record: PricingRecord): string[] {
  return [
    String(record.id),
    record.companyName,
    record.planName,
    formatCost(record.inputTokenCost),
    formatCost(record.outputTokenCost),
    record.currency,
    record.billingPeriod,
    record.createdAt.toISOString().slice(0, 10),
  ];
}

/**
 * Fixed-width table, one row per record, header and separator first
 */
export function formatRecordsTable(records: PricingRecord[]): string {
  if (records.length === 0) {
    return EMPTY_TABLE_MESSAGE;
  }

  const rows = [COLUMNS, ...records.map(toCells)];
  const widths = COLUMNS.map((_, column) =>
    Math.max(...rows.map((row) => (row[column] ?? '').length))
  );

  const render = (row: string[]): string =>
    row
      .map((cell, column) => cell.padEnd(widths[column] ?? 0))
      .join('  ')
      .trimEnd();

  const separator = widths.map((width) => '-'.repeat(width)).join('  ');

  return [render(COLUMNS), separator, ...rows.slice(1).map(render)].join('\n');
}

