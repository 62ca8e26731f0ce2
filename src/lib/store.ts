import { v4 as uuidv4 } from 'uuid';
import type { CharacterRepository } from './db';
import { NotFoundError, ValidationError } from './errors';
import { logger } from './logger';
import { applyDayToggle, applyMark, applyTally, emptyProgress } from './progress';
import { buildReviewPlan, dueSet, dueStep, parseCalendarDate } from './srs';
import type {
  CalendarDate,
  CharacterEdit,
  CharacterRecord,
  NewCharacterInput,
  Outcome,
  ReviewPlanRow,
  Settings
} from './types';

/** Null means "not learned yet"; any other value must be a readable calendar date. */
export function normalizeLearnedDate(value: CalendarDate | null): CalendarDate | null {
  if (value === null) return null;
  const date = parseCalendarDate(value);
  if (date === null) {
    throw new ValidationError(`'${value}' is not a valid learned date`);
  }
  return date;
}

export function makeCharacter(input: NewCharacterInput, settings: Settings): CharacterRecord {
  const character = input.character.trim();
  if (!character) {
    throw new ValidationError('Please enter a character.');
  }
  if (!Number.isInteger(input.setNr)) {
    throw new ValidationError(`Set number must be a whole number, got ${input.setNr}`);
  }
  const learnedDate = normalizeLearnedDate(input.learnedDate);
  return {
    id: uuidv4(),
    setNr: input.setNr,
    character,
    pinyin: input.pinyin ?? '',
    example: input.example ?? '',
    learnedDate,
    progress: emptyProgress(settings.progressSchema, settings.reviewSteps)
  };
}

/**
 * Review progress and set maintenance over a {@link CharacterRepository}.
 * Each mutation reads the current record, applies a pure transition and
 * upserts the result, so a failed write leaves the stored record as it was.
 */
export class ReviewStateStore {
  constructor(
    private readonly repo: CharacterRepository,
    private readonly settings: Settings
  ) {}

  private get steps(): number[] {
    return this.settings.reviewSteps;
  }

  private async require(id: string): Promise<CharacterRecord> {
    const record = await this.repo.get(id);
    if (!record) {
      throw new NotFoundError(`No character with id ${id}`);
    }
    return record;
  }

  private async requireSet(setNr: number): Promise<CharacterRecord[]> {
    const members = await this.charactersInSet(setNr);
    if (!members.length) {
      throw new NotFoundError(`Set ${setNr} has no characters`);
    }
    return members;
  }

  list(): Promise<CharacterRecord[]> {
    return this.repo.list();
  }

  async dueToday(today: CalendarDate): Promise<CharacterRecord[]> {
    return dueSet(await this.repo.list(), today, this.steps);
  }

  async reviewPlan(today: CalendarDate, setNr?: number): Promise<ReviewPlanRow[]> {
    const records = setNr === undefined ? await this.repo.list() : await this.charactersInSet(setNr);
    return buildReviewPlan(records, today, this.steps);
  }

  async recordOutcome(id: string, outcome: Outcome): Promise<CharacterRecord> {
    const updated = applyTally(await this.require(id), outcome);
    await this.repo.upsert([updated]);
    logger.debug('Recorded outcome', { id, outcome });
    return updated;
  }

  async setDayReviewed(id: string, step: number, value: boolean, today: CalendarDate): Promise<CharacterRecord> {
    const record = await this.require(id);
    const due = dueStep(record, today, this.steps);
    if (due !== step) {
      throw new ValidationError(`${record.character} is not due for its day ${step} review on ${today}`);
    }
    const updated = applyDayToggle(record, step, value, this.steps);
    await this.repo.upsert([updated]);
    return updated;
  }

  async setMarked(id: string, value: boolean): Promise<CharacterRecord> {
    const updated = applyMark(await this.require(id), value);
    await this.repo.upsert([updated]);
    return updated;
  }

  async addCharacter(input: NewCharacterInput): Promise<CharacterRecord> {
    const record = makeCharacter(input, this.settings);
    await this.repo.upsert([record]);
    logger.info(`Added ${record.character} to set ${record.setNr}`);
    return record;
  }

  async updateCharacter(id: string, edit: CharacterEdit): Promise<CharacterRecord> {
    const record = await this.require(id);
    const updated: CharacterRecord = {
      ...record,
      pinyin: edit.pinyin ?? record.pinyin,
      example: edit.example ?? record.example
    };
    await this.repo.upsert([updated]);
    return updated;
  }

  async updateSetDate(setNr: number, date: CalendarDate | null): Promise<CharacterRecord[]> {
    const learnedDate = normalizeLearnedDate(date);
    const updated = (await this.requireSet(setNr)).map((r) => ({ ...r, learnedDate }));
    await this.repo.upsert(updated);
    logger.info(`Set ${setNr} learned date is now ${learnedDate ?? 'unset'}`);
    return updated;
  }

  async deleteCharacter(id: string): Promise<void> {
    const record = await this.require(id);
    await this.repo.delete([record.id]);
    logger.info(`Deleted ${record.character} from set ${record.setNr}`);
  }

  async deleteSet(setNr: number): Promise<number> {
    const members = await this.requireSet(setNr);
    await this.repo.delete(members.map((r) => r.id));
    logger.info(`Deleted set ${setNr}`, { count: members.length });
    return members.length;
  }

  async listSets(): Promise<number[]> {
    const sets = new Set((await this.repo.list()).map((r) => r.setNr));
    return [...sets].sort((a, b) => a - b);
  }

  async charactersInSet(setNr: number): Promise<CharacterRecord[]> {
    return (await this.repo.list()).filter((r) => r.setNr === setNr);
  }

  /** Earliest learned date in the set, or null when none of its members has one. */
  async setLearnedDate(setNr: number): Promise<CalendarDate | null> {
    const dates = (await this.requireSet(setNr))
      .map((r) => r.learnedDate)
      .filter((d): d is CalendarDate => d !== null)
      .sort();
    return dates[0] ?? null;
  }

  async frequentlyWrong(): Promise<CharacterRecord[]> {
    const threshold = this.settings.frequentWrongThreshold;
    return (await this.repo.list()).filter((r) => r.progress.schema === 'tally' && r.progress.wrong >= threshold);
  }

  async markedCharacters(): Promise<CharacterRecord[]> {
    return (await this.repo.list()).filter((r) => r.progress.schema === 'perDay' && r.progress.marked);
  }

  async importRecords(records: CharacterRecord[]): Promise<number> {
    await logger.time(`Import of ${records.length} characters`, () => this.repo.upsert(records));
    logger.info('Imported characters', { count: records.length });
    return records.length;
  }
}
