import { v4 as uuidv4 } from 'uuid';
import { logger } from './logger';
import { parseCalendarDate } from './srs';
import type { CharacterRecord, Progress, ProgressSchema } from './types';

const BASE_COLUMNS = ['id', 'set_nr', 'character', 'pinyin', 'example', 'learned_date'] as const;
const TALLY_COLUMNS = ['correct', 'wrong'] as const;

const DAY_PREFIX = 'reviewed_on_day_';

function dayColumn(step: number): string {
  return `${DAY_PREFIX}${step}`;
}

function columnStep(column: string): number | undefined {
  if (!column.startsWith(DAY_PREFIX)) return undefined;
  const step = Number(column.slice(DAY_PREFIX.length));
  return Number.isInteger(step) && step > 0 ? step : undefined;
}

/** Ladder days plus any day a record still carries a flag for, ascending. */
function exportDays(records: CharacterRecord[], steps: number[]): number[] {
  const days = new Set(steps.filter((s) => s > 0));
  for (const { progress } of records) {
    if (progress.schema !== 'perDay') continue;
    for (const key of Object.keys(progress.reviewedOnDay)) {
      const step = Number(key);
      if (Number.isInteger(step) && step > 0) days.add(step);
    }
  }
  return [...days].sort((a, b) => a - b);
}

function quoteCell(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/** Splits CSV text into rows of cells; quoted cells may hold commas, quotes and newlines. */
export function splitCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let cell = '';
  let quoted = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quoted) {
      if (ch === '"' && text[i + 1] === '"') {
        cell += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        cell += ch;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === ',') {
      row.push(cell);
      cell = '';
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && text[i + 1] === '\n') i++;
      row.push(cell);
      rows.push(row);
      row = [];
      cell = '';
    } else {
      cell += ch;
    }
  }
  if (cell || row.length) {
    row.push(cell);
    rows.push(row);
  }
  return rows.filter((r) => r.some((c) => c.trim() !== ''));
}

function parseBool(value: string | undefined): boolean {
  return ['true', '1', 'yes'].includes((value ?? '').trim().toLowerCase());
}

function parseCount(value: string | undefined): number {
  const n = Number((value ?? '').trim());
  return Number.isFinite(n) && n > 0 ? Math.floor(n) : 0;
}

function filled(value: string | undefined): boolean {
  return (value ?? '').trim() !== '';
}

function rowSchema(
  cell: (name: string) => string | undefined,
  columns: string[],
  fallback: ProgressSchema
): ProgressSchema {
  const perDayNames = columns.filter((c) => c === 'marked' || c.startsWith(DAY_PREFIX));
  if (perDayNames.some((c) => filled(cell(c)))) return 'perDay';
  if (TALLY_COLUMNS.some((c) => filled(cell(c)))) return 'tally';
  if (perDayNames.length) return 'perDay';
  if (TALLY_COLUMNS.some((c) => columns.includes(c))) return 'tally';
  return fallback;
}

function readProgress(
  schema: ProgressSchema,
  cell: (name: string) => string | undefined,
  steps: number[],
  columns: string[]
): Progress {
  switch (schema) {
    case 'tally':
      return { schema: 'tally', correct: parseCount(cell('correct')), wrong: parseCount(cell('wrong')) };
    case 'perDay': {
      const reviewedOnDay: Record<number, boolean> = {};
      for (const step of steps) {
        if (step > 0) reviewedOnDay[step] = parseBool(cell(dayColumn(step)));
      }
      // Days off the current ladder are kept only where the row has a value.
      for (const column of columns) {
        const step = columnStep(column);
        if (step !== undefined && !(step in reviewedOnDay) && filled(cell(column))) {
          reviewedOnDay[step] = parseBool(cell(column));
        }
      }
      return { schema: 'perDay', marked: parseBool(cell('marked')), reviewedOnDay };
    }
  }
}

/**
 * Reads the flat character table. Missing columns fall back to defaults and
 * each row's progress schema follows from which progress cells it fills.
 */
export function parseCsv(text: string, steps: number[], fallbackSchema: ProgressSchema): CharacterRecord[] {
  const [header, ...rows] = splitCsv(text);
  if (!header) return [];
  const columns = header.map((h) => h.trim().toLowerCase());

  const records: CharacterRecord[] = [];
  for (const row of rows) {
    const cell = (name: string): string | undefined => {
      const idx = columns.indexOf(name);
      return idx === -1 ? undefined : row[idx];
    };

    const character = (cell('character') ?? '').trim();
    if (!character) continue;

    const rawDate = cell('learned_date') ?? '';
    const learnedDate = parseCalendarDate(rawDate);
    if (learnedDate === null && rawDate.trim()) {
      logger.warn('Unreadable learned_date, leaving it unset', { character, value: rawDate });
    }

    const setNr = Number((cell('set_nr') ?? '').trim());
    records.push({
      id: filled(cell('id')) ? (cell('id') ?? '').trim() : uuidv4(),
      setNr: Number.isInteger(setNr) ? setNr : 0,
      character,
      pinyin: cell('pinyin') ?? '',
      example: cell('example') ?? '',
      learnedDate,
      progress: readProgress(rowSchema(cell, columns, fallbackSchema), cell, steps, columns)
    });
  }
  return records;
}

function progressCells(progress: Progress, hasTally: boolean, days: number[] | null, steps: number[]): string[] {
  switch (progress.schema) {
    case 'tally': {
      const blankPerDay = days ? Array.from({ length: days.length + 1 }, () => '') : [];
      return [...(hasTally ? [String(progress.correct), String(progress.wrong)] : []), ...blankPerDay];
    }
    case 'perDay': {
      const flags = (days ?? []).map((s) =>
        steps.includes(s) || s in progress.reviewedOnDay ? String(progress.reviewedOnDay[s] === true) : ''
      );
      return [...(hasTally ? ['', ''] : []), String(progress.marked), ...flags];
    }
  }
}

export function toCsv(records: CharacterRecord[], steps: number[]): string {
  const hasTally = records.some((r) => r.progress.schema === 'tally');
  const hasPerDay = records.some((r) => r.progress.schema === 'perDay');
  const days = hasPerDay ? exportDays(records, steps) : null;
  const perDay = days ? ['marked', ...days.map(dayColumn)] : [];
  const header = [...BASE_COLUMNS, ...(hasTally ? TALLY_COLUMNS : []), ...perDay];

  const rows = records.map((r) =>
    [
      r.id,
      String(r.setNr),
      r.character,
      r.pinyin,
      r.example,
      r.learnedDate ?? '',
      ...progressCells(r.progress, hasTally, days, steps)
    ].map(quoteCell).join(',')
  );
  return [header.join(','), ...rows].join('\n');
}

export function downloadText(filename: string, data: string, mimeType: string) {
  const blob = new Blob([data], { type: mimeType });
  const url = URL.createObjectURL(blob);
  const a = document.createElement('a');
  a.href = url;
  a.download = filename;
  a.click();
  URL.revokeObjectURL(url);
}
