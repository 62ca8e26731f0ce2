/** Calendar date in `yyyy-MM-dd` form. */
export type CalendarDate = string;

export type ProgressSchema = 'tally' | 'perDay';

export type Outcome = 'correct' | 'wrong';

export interface TallyProgress {
  schema: 'tally';
  correct: number;
  wrong: number;
}

export interface PerDayProgress {
  schema: 'perDay';
  marked: boolean;
  /** Keyed by ladder step; day 0 has no entry. */
  reviewedOnDay: Record<number, boolean>;
}

export type Progress = TallyProgress | PerDayProgress;

export interface CharacterRecord {
  id: string;
  setNr: number;
  character: string;
  pinyin: string;
  example: string;
  learnedDate: CalendarDate | null;
  progress: Progress;
}

export interface NewCharacterInput {
  setNr: number;
  character: string;
  pinyin?: string;
  example?: string;
  learnedDate: CalendarDate | null;
}

export type CharacterEdit = Partial<Pick<CharacterRecord, 'pinyin' | 'example'>>;

export type PlanCellStatus = 'completed' | 'pendingFailed' | 'notYet' | 'notCompleted';

export interface PlanCell {
  step: number;
  date: CalendarDate | null;
  label: string;
  status: PlanCellStatus;
}

export interface ReviewPlanRow {
  id: string;
  setNr: number;
  character: string;
  learnedDate: CalendarDate | null;
  /** Right/wrong counts for tally records; null for per-day records. */
  tally: { correct: number; wrong: number } | null;
  cells: PlanCell[];
}

export interface Settings {
  reviewSteps: number[];
  progressSchema: ProgressSchema;
  frequentWrongThreshold: number;
  seedDemoSet: boolean;
}
