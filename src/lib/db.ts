import Dexie, { type Table } from 'dexie';
import { PersistenceError } from './errors';
import { logger } from './logger';
import { defaultSettings } from './srs';
import type { CharacterRecord, Settings } from './types';

interface SettingRecord {
  key: string;
  value: Settings;
}

export class HanziDb extends Dexie {
  characters!: Table<CharacterRecord, string>;
  settings!: Table<SettingRecord, string>;

  constructor(name = 'hanzi-ladder-db') {
    super(name);
    this.version(1).stores({
      characters: 'id, setNr, character',
      settings: 'key'
    });
  }
}

export const db = new HanziDb();

/** Storage contract the review store writes through: whole records in, ids out. */
export interface CharacterRepository {
  list(): Promise<CharacterRecord[]>;
  get(id: string): Promise<CharacterRecord | undefined>;
  upsert(records: CharacterRecord[]): Promise<void>;
  delete(ids: string[]): Promise<void>;
}

async function guard<T>(action: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    logger.error(`Storage failed to ${action}`, err);
    throw new PersistenceError(`Could not ${action}`, err);
  }
}

export class DexieCharacterRepository implements CharacterRepository {
  constructor(private readonly database: HanziDb = db) {}

  list(): Promise<CharacterRecord[]> {
    return guard('read characters', () => this.database.characters.orderBy('setNr').toArray());
  }

  get(id: string): Promise<CharacterRecord | undefined> {
    return guard('read characters', () => this.database.characters.get(id));
  }

  async upsert(records: CharacterRecord[]): Promise<void> {
    if (!records.length) return;
    await guard('save characters', () =>
      this.database.transaction('rw', this.database.characters, async () => {
        await this.database.characters.bulkPut(records);
      })
    );
  }

  async delete(ids: string[]): Promise<void> {
    if (!ids.length) return;
    await guard('delete characters', () =>
      this.database.transaction('rw', this.database.characters, async () => {
        await this.database.characters.bulkDelete(ids);
      })
    );
  }
}

export async function loadSettings(database: HanziDb = db): Promise<Settings> {
  const record = await guard('read settings', () => database.settings.get('app-settings'));
  if (!record) {
    await saveSettings(defaultSettings, database);
    return defaultSettings;
  }
  return { ...defaultSettings, ...record.value };
}

export async function saveSettings(settings: Settings, database: HanziDb = db): Promise<void> {
  await guard('save settings', () => database.settings.put({ key: 'app-settings', value: settings }));
}
