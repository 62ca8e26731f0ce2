import { v4 as uuidv4 } from 'uuid';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DexieCharacterRepository, HanziDb, loadSettings, saveSettings } from '../lib/db';
import { NotFoundError, PersistenceError, ValidationError } from '../lib/errors';
import { seedDemoSetIfEmpty } from '../lib/seed';
import { defaultSettings } from '../lib/srs';
import { ReviewStateStore } from '../lib/store';
import type { CharacterRecord, Settings } from '../lib/types';

const perDaySettings: Settings = { ...defaultSettings, progressSchema: 'perDay' };

let database: HanziDb;
let repo: DexieCharacterRepository;

function storeWith(settings: Settings = defaultSettings): ReviewStateStore {
  return new ReviewStateStore(repo, settings);
}

beforeEach(() => {
  database = new HanziDb(`test-${uuidv4()}`);
  repo = new DexieCharacterRepository(database);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await database.delete();
});

describe('adding characters', () => {
  it('rejects an empty glyph without touching the collection', async () => {
    const store = storeWith();
    await store.addCharacter({ setNr: 1, character: '爱', learnedDate: '2024-01-01' });
    await expect(store.addCharacter({ setNr: 1, character: '   ', learnedDate: '2024-01-01' })).rejects.toThrow(
      ValidationError
    );
    expect(await store.list()).toHaveLength(1);
  });

  it('rejects a fractional set number', async () => {
    await expect(storeWith().addCharacter({ setNr: 1.5, character: '爱', learnedDate: null })).rejects.toThrow(
      'Set number must be a whole number, got 1.5'
    );
    expect(await repo.list()).toEqual([]);
  });

  it('trims the glyph and starts progress in the configured schema', async () => {
    const tally = await storeWith().addCharacter({ setNr: 2, character: ' 学 ', pinyin: 'xué', learnedDate: '2024-01-01' });
    expect(tally).toMatchObject({ setNr: 2, character: '学', pinyin: 'xué', example: '' });
    expect(tally.progress).toEqual({ schema: 'tally', correct: 0, wrong: 0 });

    const perDay = await storeWith(perDaySettings).addCharacter({ setNr: 2, character: '书', learnedDate: '2024-01-01' });
    expect(perDay.progress).toEqual({
      schema: 'perDay',
      marked: false,
      reviewedOnDay: { 1: false, 2: false, 4: false, 7: false, 15: false, 30: false, 90: false, 180: false }
    });
    expect(await repo.get(perDay.id)).toEqual(perDay);
  });

  it.each(['', 'garbage'])('rejects %j as a learned date', async (learnedDate) => {
    const store = storeWith();
    await expect(store.addCharacter({ setNr: 1, character: '爱', learnedDate })).rejects.toThrow(ValidationError);
    await expect(store.addCharacter({ setNr: 1, character: '爱', learnedDate })).rejects.toThrow(
      `'${learnedDate}' is not a valid learned date`
    );
    expect(await repo.list()).toEqual([]);
  });

  it('keeps only the calendar day of a timestamp', async () => {
    const added = await storeWith().addCharacter({ setNr: 1, character: '爱', learnedDate: '2024-03-05T10:00:00' });
    expect(added.learnedDate).toBe('2024-03-05');
  });
});

describe('review interactions', () => {
  it('persists tally increments', async () => {
    const store = storeWith();
    const ai = await store.addCharacter({ setNr: 1, character: '爱', learnedDate: '2024-01-01' });
    await store.recordOutcome(ai.id, 'correct');
    await store.recordOutcome(ai.id, 'wrong');
    await store.recordOutcome(ai.id, 'correct');
    expect((await repo.get(ai.id))?.progress).toEqual({ schema: 'tally', correct: 2, wrong: 1 });
  });

  it('flips day 1 in the plan after the first answer', async () => {
    const store = storeWith();
    const ai = await store.addCharacter({ setNr: 1, character: '爱', learnedDate: '2024-01-01' });
    const [before] = await store.reviewPlan('2024-01-03', 1);
    expect(before.cells.slice(0, 2).map((c) => c.status)).toEqual(['notYet', 'pendingFailed']);

    await store.recordOutcome(ai.id, 'correct');
    const [after] = await store.reviewPlan('2024-01-03', 1);
    expect(after.cells.slice(0, 3).map((c) => c.status)).toEqual(['completed', 'completed', 'notYet']);
  });

  it('toggles only the due day of one record', async () => {
    const store = storeWith(perDaySettings);
    const ai = await store.addCharacter({ setNr: 1, character: '爱', learnedDate: '2024-01-01' });
    const xue = await store.addCharacter({ setNr: 1, character: '学', learnedDate: '2024-01-01' });

    const updated = await store.setDayReviewed(ai.id, 4, true, '2024-01-05');
    expect(updated).toEqual({
      ...ai,
      progress: { ...ai.progress, reviewedOnDay: { 1: false, 2: false, 4: true, 7: false, 15: false, 30: false, 90: false, 180: false } }
    });
    expect(await repo.get(ai.id)).toEqual(updated);
    expect(await repo.get(xue.id)).toEqual(xue);
  });

  it('refuses to toggle a day that is not due today', async () => {
    const store = storeWith(perDaySettings);
    const ai = await store.addCharacter({ setNr: 1, character: '爱', learnedDate: '2024-01-01' });
    await expect(store.setDayReviewed(ai.id, 4, true, '2024-01-06')).rejects.toThrow(
      '爱 is not due for its day 4 review on 2024-01-06'
    );
    expect(await repo.get(ai.id)).toEqual(ai);
  });

  it('marks at any time', async () => {
    const store = storeWith(perDaySettings);
    const ai = await store.addCharacter({ setNr: 1, character: '爱', learnedDate: null });
    await store.setMarked(ai.id, true);
    expect(await store.markedCharacters()).toHaveLength(1);
    await store.setMarked(ai.id, false);
    expect(await store.markedCharacters()).toEqual([]);
  });

  it('reports unknown ids', async () => {
    await expect(storeWith().recordOutcome('missing', 'correct')).rejects.toThrow(NotFoundError);
    await expect(storeWith().deleteCharacter('missing')).rejects.toThrow('No character with id missing');
  });
});

describe('due set', () => {
  it('lists the characters due today', async () => {
    const store = storeWith();
    await store.addCharacter({ setNr: 1, character: '爱', learnedDate: '2024-01-01' });
    await store.addCharacter({ setNr: 2, character: '书', learnedDate: '2024-01-03' });
    await store.addCharacter({ setNr: 2, character: '猫', learnedDate: null });

    expect((await store.dueToday('2024-01-03')).map((r) => r.character).sort()).toEqual(['书', '爱']);
    expect((await store.dueToday('2024-01-04')).map((r) => r.character)).toEqual(['书']);
    expect(await store.dueToday('2024-01-06')).toEqual([]);
  });
});

describe('set maintenance', () => {
  async function seedSets(store: ReviewStateStore): Promise<CharacterRecord[]> {
    return [
      await store.addCharacter({ setNr: 1, character: '爱', learnedDate: '2024-01-03' }),
      await store.addCharacter({ setNr: 1, character: '学', learnedDate: '2024-01-01' }),
      await store.addCharacter({ setNr: 4, character: '书', learnedDate: '2024-02-01' }),
      await store.addCharacter({ setNr: 2, character: '猫', learnedDate: null })
    ];
  }

  it('lists sets in order and finds the earliest learned date', async () => {
    const store = storeWith();
    await seedSets(store);
    expect(await store.listSets()).toEqual([1, 2, 4]);
    expect(await store.setLearnedDate(1)).toBe('2024-01-01');
    expect(await store.setLearnedDate(2)).toBeNull();
  });

  it('moves a whole set to a new date', async () => {
    const store = storeWith();
    await seedSets(store);
    await store.updateSetDate(1, '2024-03-01');
    expect((await store.charactersInSet(1)).map((r) => r.learnedDate)).toEqual(['2024-03-01', '2024-03-01']);
    expect((await store.charactersInSet(4))[0].learnedDate).toBe('2024-02-01');
  });

  it.each(['', 'garbage'])('refuses to move a set to %j', async (date) => {
    const store = storeWith();
    await seedSets(store);
    await expect(store.updateSetDate(1, date)).rejects.toThrow(`'${date}' is not a valid learned date`);
    expect((await store.charactersInSet(1)).map((r) => r.learnedDate).sort()).toEqual(['2024-01-01', '2024-01-03']);
    expect(await store.dueToday('2024-01-03')).toHaveLength(2);
  });

  it('clears a set date with null and leaves it out of the due set', async () => {
    const store = storeWith();
    await seedSets(store);
    await store.updateSetDate(1, null);
    expect((await store.charactersInSet(1)).map((r) => r.learnedDate)).toEqual([null, null]);
    expect(await store.setLearnedDate(1)).toBeNull();
    expect(await store.dueToday('2024-01-03')).toEqual([]);
  });

  it('edits pinyin and example only', async () => {
    const store = storeWith();
    const [ai] = await seedSets(store);
    const edited = await store.updateCharacter(ai.id, { example: '我爱你' });
    expect(edited).toEqual({ ...ai, example: '我爱你' });
  });

  it('deletes every member of a set and nothing else', async () => {
    const store = storeWith();
    await seedSets(store);
    expect(await store.deleteSet(1)).toBe(2);
    expect((await store.list()).map((r) => r.setNr).sort()).toEqual([2, 4]);
    await expect(store.deleteSet(1)).rejects.toThrow('Set 1 has no characters');
  });

  it('deletes a single character', async () => {
    const store = storeWith();
    const [ai, xue] = await seedSets(store);
    await store.deleteCharacter(ai.id);
    expect(await repo.get(ai.id)).toBeUndefined();
    expect(await store.charactersInSet(1)).toEqual([xue]);
  });

  it('lists characters answered wrong at least the threshold', async () => {
    const store = storeWith();
    const [ai, xue] = await seedSets(store);
    await store.recordOutcome(ai.id, 'wrong');
    await store.recordOutcome(ai.id, 'wrong');
    await store.recordOutcome(xue.id, 'wrong');
    expect((await store.frequentlyWrong()).map((r) => r.character)).toEqual(['爱']);
    expect(await storeWith({ ...defaultSettings, frequentWrongThreshold: 1 }).frequentlyWrong()).toHaveLength(2);
  });
});

describe('persistence', () => {
  it('round-trips records through the repository', async () => {
    const record: CharacterRecord = {
      id: 'r1',
      setNr: 0,
      character: '猫',
      pinyin: 'māo',
      example: '小猫, 睡觉',
      learnedDate: '2024-05-05',
      progress: { schema: 'perDay', marked: true, reviewedOnDay: { 1: true, 2: false } }
    };
    await repo.upsert([record]);
    expect(await repo.list()).toEqual([record]);
  });

  it('imports by id, replacing existing records', async () => {
    const store = storeWith();
    const ai = await store.addCharacter({ setNr: 1, character: '爱', learnedDate: '2024-01-01' });
    await store.importRecords([{ ...ai, pinyin: 'ài' }]);
    expect(await store.list()).toEqual([{ ...ai, pinyin: 'ài' }]);
  });

  it('wraps storage failures and keeps the stored record', async () => {
    const store = storeWith();
    const ai = await store.addCharacter({ setNr: 1, character: '爱', learnedDate: '2024-01-01' });
    vi.spyOn(database.characters, 'bulkPut').mockRejectedValue(new Error('disk full'));

    const failure = store.recordOutcome(ai.id, 'correct');
    await expect(failure).rejects.toThrow(PersistenceError);
    await expect(failure).rejects.toThrow('Could not save characters');

    vi.restoreAllMocks();
    expect(await repo.get(ai.id)).toEqual(ai);
  });

  it('falls back to default settings and merges saved ones', async () => {
    expect(await loadSettings(database)).toEqual(defaultSettings);
    await saveSettings({ ...defaultSettings, frequentWrongThreshold: 5 }, database);
    expect((await loadSettings(database)).frequentWrongThreshold).toBe(5);
  });

  it('wraps settings read failures', async () => {
    vi.spyOn(database.settings, 'get').mockRejectedValue(new Error('disk full'));
    const failure = loadSettings(database);
    await expect(failure).rejects.toThrow(PersistenceError);
    await expect(failure).rejects.toThrow('Could not read settings');
  });

  it('wraps settings write failures', async () => {
    vi.spyOn(database.settings, 'put').mockRejectedValue(new Error('disk full'));
    await expect(saveSettings(defaultSettings, database)).rejects.toThrow('Could not save settings');
  });

  it('seeds the demo set once into an empty collection', async () => {
    expect(await seedDemoSetIfEmpty(defaultSettings, '2024-01-01', database)).toBe(true);
    const seeded = await repo.list();
    expect(seeded).toHaveLength(6);
    expect(seeded.every((r) => r.setNr === 1 && r.learnedDate === '2024-01-01')).toBe(true);
    expect(await seedDemoSetIfEmpty(defaultSettings, '2024-01-01', database)).toBe(false);
  });
});
