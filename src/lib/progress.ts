import { ValidationError } from './errors';
import type { CharacterRecord, Outcome, PerDayProgress, Progress, ProgressSchema, TallyProgress } from './types';

export function emptyProgress(schema: ProgressSchema, steps: number[]): Progress {
  switch (schema) {
    case 'tally':
      return { schema: 'tally', correct: 0, wrong: 0 };
    case 'perDay': {
      const reviewedOnDay: Record<number, boolean> = {};
      for (const step of steps) {
        if (step > 0) reviewedOnDay[step] = false;
      }
      return { schema: 'perDay', marked: false, reviewedOnDay };
    }
  }
}

export function isInteracted(progress: Progress): boolean {
  switch (progress.schema) {
    case 'tally':
      return progress.correct > 0 || progress.wrong > 0;
    case 'perDay':
      return progress.marked || Object.values(progress.reviewedOnDay).some(Boolean);
  }
}

function requireTally(record: CharacterRecord): TallyProgress {
  if (record.progress.schema !== 'tally') {
    throw new ValidationError(`${record.character} does not keep a correct/wrong tally`);
  }
  return record.progress;
}

function requirePerDay(record: CharacterRecord): PerDayProgress {
  if (record.progress.schema !== 'perDay') {
    throw new ValidationError(`${record.character} does not keep per-day review flags`);
  }
  return record.progress;
}

export function applyTally(record: CharacterRecord, outcome: Outcome): CharacterRecord {
  const tally = requireTally(record);
  return {
    ...record,
    progress: {
      ...tally,
      correct: outcome === 'correct' ? tally.correct + 1 : tally.correct,
      wrong: outcome === 'wrong' ? tally.wrong + 1 : tally.wrong
    }
  };
}

export function applyDayToggle(record: CharacterRecord, step: number, value: boolean, steps: number[]): CharacterRecord {
  const perDay = requirePerDay(record);
  if (step <= 0 || !steps.includes(step)) {
    throw new ValidationError(`Day ${step} is not a review day`);
  }
  return {
    ...record,
    progress: { ...perDay, reviewedOnDay: { ...perDay.reviewedOnDay, [step]: value } }
  };
}

export function applyMark(record: CharacterRecord, value: boolean): CharacterRecord {
  const perDay = requirePerDay(record);
  return { ...record, progress: { ...perDay, marked: value } };
}
