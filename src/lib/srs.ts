import { addDays, format, isValid, parseISO } from 'date-fns';
import { isInteracted } from './progress';
import type { CalendarDate, CharacterRecord, PlanCell, PlanCellStatus, Progress, ReviewPlanRow, Settings } from './types';

/** Days after learning on which a character comes up for review. */
export const defaultReviewSteps: number[] = [0, 1, 2, 4, 7, 15, 30, 90, 180];

export const defaultSettings: Settings = {
  reviewSteps: defaultReviewSteps,
  progressSchema: 'tally',
  frequentWrongThreshold: 2,
  seedDemoSet: true
};

const DATE_FORMAT = 'yyyy-MM-dd';

export function toCalendarDate(date: Date): CalendarDate {
  return format(date, DATE_FORMAT);
}

/**
 * Normalizes a date or datetime string to its calendar date, or null when it
 * cannot be parsed.
 */
export function parseCalendarDate(value: string): CalendarDate | null {
  const trimmed = value.trim();
  if (!trimmed) return null;
  const parsed = parseISO(trimmed.length > 10 ? trimmed.slice(0, 10) : trimmed);
  return isValid(parsed) ? toCalendarDate(parsed) : null;
}

export function addCalendarDays(date: CalendarDate, days: number): CalendarDate {
  return toCalendarDate(addDays(parseISO(date), days));
}

export function reviewDates(learnedDate: CalendarDate, steps: number[]): CalendarDate[] {
  return steps.map((step) => addCalendarDays(learnedDate, step));
}

/** First ladder step whose review date is `today`, scanning in ladder order. */
export function dueStep(record: CharacterRecord, today: CalendarDate, steps: number[]): number | undefined {
  const { learnedDate } = record;
  if (learnedDate === null) return undefined;
  return steps.find((step) => addCalendarDays(learnedDate, step) === today);
}

export function isDue(record: CharacterRecord, today: CalendarDate, steps: number[]): boolean {
  return dueStep(record, today, steps) !== undefined;
}

export function dueSet(records: CharacterRecord[], today: CalendarDate, steps: number[]): CharacterRecord[] {
  return records.filter((r) => isDue(r, today, steps));
}

// Tally counters are not per day: any interaction counts as every past day done.
function tallyCellStatus(step: number, date: CalendarDate, today: CalendarDate, interacted: boolean): PlanCellStatus {
  if (step === 1) return interacted ? 'completed' : 'notYet';
  if (date > today) return 'notYet';
  return interacted ? 'completed' : 'pendingFailed';
}

function cellStatus(progress: Progress, step: number, date: CalendarDate, today: CalendarDate): PlanCellStatus {
  switch (progress.schema) {
    case 'tally':
      return tallyCellStatus(step, date, today, isInteracted(progress));
    case 'perDay':
      return date === today && progress.reviewedOnDay[step] === true ? 'completed' : 'notCompleted';
  }
}

export function buildReviewPlan(records: CharacterRecord[], today: CalendarDate, steps: number[]): ReviewPlanRow[] {
  const planSteps = steps.filter((s) => s > 0);
  return records.map((record) => {
    const { learnedDate } = record;
    const cells: PlanCell[] = planSteps.map((step) => {
      if (learnedDate === null) {
        return { step, date: null, label: `Day ${step}`, status: 'notYet' };
      }
      const date = addCalendarDays(learnedDate, step);
      return { step, date, label: `Day ${step} (${date})`, status: cellStatus(record.progress, step, date, today) };
    });
    const { progress } = record;
    const tally = progress.schema === 'tally' ? { correct: progress.correct, wrong: progress.wrong } : null;
    return { id: record.id, setNr: record.setNr, character: record.character, learnedDate, tally, cells };
  });
}

export function planCellSymbol(status: PlanCellStatus): string {
  switch (status) {
    case 'completed':
      return '✅';
    case 'pendingFailed':
      return '❌';
    case 'notYet':
      return '--';
    case 'notCompleted':
      return '⬜';
  }
}

/** Non-empty, non-negative whole days, strictly ascending. */
export function isValidLadder(steps: number[]): boolean {
  if (!steps.length) return false;
  return steps.every((s, i) => Number.isInteger(s) && s >= 0 && (i === 0 || s > steps[i - 1]));
}
