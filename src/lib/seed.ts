import { v4 as uuidv4 } from 'uuid';
import { db, type HanziDb } from './db';
import { logger } from './logger';
import { emptyProgress } from './progress';
import type { CalendarDate, CharacterRecord, Settings } from './types';

const demoRows: Array<Pick<CharacterRecord, 'character' | 'pinyin' | 'example'>> = [
  { character: '爱', pinyin: 'ài', example: '我爱我的家。' },
  { character: '学', pinyin: 'xué', example: '我们一起学中文。' },
  { character: '朋', pinyin: 'péng', example: '他是我的好朋友。' },
  { character: '友', pinyin: 'yǒu', example: '朋友来我家吃饭。' },
  { character: '书', pinyin: 'shū', example: '这本书很有意思。' },
  { character: '猫', pinyin: 'māo', example: '小猫在睡觉。' }
];

let seededAttempted = false;

/** Adds the demo set once per page load when the collection is empty; returns whether it did. */
export async function seedDemoSetIfEmpty(settings: Settings, today: CalendarDate, database: HanziDb = db): Promise<boolean> {
  if (seededAttempted || !settings.seedDemoSet) {
    return false;
  }
  seededAttempted = true;

  return database.transaction('rw', database.characters, async () => {
    const count = await database.characters.count();
    if (count > 0) {
      return false;
    }

    const records: CharacterRecord[] = demoRows.map((row) => ({
      id: uuidv4(),
      setNr: 1,
      character: row.character,
      pinyin: row.pinyin,
      example: row.example,
      learnedDate: today,
      progress: emptyProgress(settings.progressSchema, settings.reviewSteps)
    }));

    await database.characters.bulkAdd(records);
    logger.info('Seeded demo set', { count: records.length });
    return true;
  });
}
