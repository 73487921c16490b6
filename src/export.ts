import type { UidRecord } from './types';

export const CSV_HEADER = ['uid', 'note', 'source', 'submitted_by', 'chat_id', 'created_at'] as const;

type CsvValue = string | number | null;

function escapeCsv(value: CsvValue): string {
  if (value === null) return '';
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv(rows: CsvValue[][]): string {
  return rows.map((row) => row.map(escapeCsv).join(',')).join('\r\n') + '\r\n';
}

export function recordsToCsv(records: UidRecord[]): string {
  const rows: CsvValue[][] = [[...CSV_HEADER]];
  for (const r of records) {
    rows.push([r.uid, r.note, r.source, r.submittedBy, r.chatId, new Date(r.createdAt).toISOString()]);
  }
  return toCsv(rows);
}

export function exportFilename(now: Date = new Date()): string {
  return `uids_${now.toISOString().slice(0, 10)}.csv`;
}
