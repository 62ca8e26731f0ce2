import { useEffect, useMemo, useState } from 'react';
import { DexieCharacterRepository, loadSettings, saveSettings } from './lib/db';
import { checkPassphrase, getAppEnv } from './lib/env';
import { isAppError } from './lib/errors';
import { downloadText, parseCsv, toCsv } from './lib/io';
import { logger } from './lib/logger';
import { seedDemoSetIfEmpty } from './lib/seed';
import { defaultSettings, dueStep, isValidLadder, planCellSymbol, toCalendarDate } from './lib/srs';
import { ReviewStateStore } from './lib/store';
import type { CalendarDate, CharacterRecord, Outcome, ReviewPlanRow, Settings } from './lib/types';
import './styles.css';

type Screen = 'flashcards' | 'dashboard' | 'maintain' | 'import' | 'settings';
type MaintainAction = 'new' | 'edit' | 'delete';

const screens: Screen[] = ['flashcards', 'dashboard', 'maintain', 'import', 'settings'];
const maintainActions: MaintainAction[] = ['new', 'edit', 'delete'];

interface ReviewView {
  due: CharacterRecord[];
  sets: number[];
  planSetNr: number | null;
  plan: ReviewPlanRow[];
  frequentlyWrong: CharacterRecord[];
  marked: CharacterRecord[];
}

const emptyView: ReviewView = { due: [], sets: [], planSetNr: null, plan: [], frequentlyWrong: [], marked: [] };

const repository = new DexieCharacterRepository();
const env = getAppEnv();

async function loadView(store: ReviewStateStore, today: CalendarDate, planSet: number | null): Promise<ReviewView> {
  const sets = await store.listSets();
  const planSetNr = planSet !== null && sets.includes(planSet) ? planSet : sets[0] ?? null;
  return {
    due: await store.dueToday(today),
    sets,
    planSetNr,
    plan: planSetNr === null ? [] : await store.reviewPlan(today, planSetNr),
    frequentlyWrong: await store.frequentlyWrong(),
    marked: await store.markedCharacters()
  };
}

/** Empty date inputs mean "no learned date". */
function dateInputValue(value: string): CalendarDate | null {
  return value ? value : null;
}

function PassphraseGate({ onUnlock }: { onUnlock: () => void }) {
  const [input, setInput] = useState('');
  const [failed, setFailed] = useState(false);

  function submit() {
    if (checkPassphrase(input, env.accessPassphrase)) {
      onUnlock();
    } else {
      setFailed(true);
      setInput('');
    }
  }

  return (
    <section className="gate">
      <label>Enter password: <input type="password" value={input} onChange={(e) => setInput(e.target.value)} onKeyDown={(e) => { if (e.key === 'Enter') submit(); }} /></label>
      <button onClick={submit}>Unlock</button>
      {failed && <p className="error">❌ Incorrect password</p>}
    </section>
  );
}

export default function App() {
  const [unlocked, setUnlocked] = useState(env.accessPassphrase === undefined);
  const [screen, setScreen] = useState<Screen>('flashcards');
  const [records, setRecords] = useState<CharacterRecord[]>([]);
  const [settings, setSettings] = useState<Settings>(defaultSettings);
  const [today] = useState<CalendarDate>(() => toCalendarDate(new Date()));
  const [notice, setNotice] = useState<{ kind: 'success' | 'error'; text: string } | null>(null);
  const [revealed, setRevealed] = useState<Record<string, boolean>>({});
  const [planSet, setPlanSet] = useState<number | null>(null);
  const [action, setAction] = useState<MaintainAction>('new');
  const [editSet, setEditSet] = useState<number | null>(null);
  const [setDateDraft, setSetDateDraft] = useState<CalendarDate | null>(today);
  const [draft, setDraft] = useState<{ setNr: number; character: string; pinyin: string; example: string; learnedDate: CalendarDate | null }>(
    { setNr: 1, character: '', pinyin: '', example: '', learnedDate: today }
  );
  const [edits, setEdits] = useState<Record<string, { pinyin: string; example: string }>>({});
  const [confirmDelete, setConfirmDelete] = useState<Record<string, boolean>>({});
  const [importText, setImportText] = useState('');
  const [ladderText, setLadderText] = useState(defaultSettings.reviewSteps.join(','));

  const store = useMemo(() => new ReviewStateStore(repository, settings), [settings]);
  const [view, setView] = useState<ReviewView>(emptyView);
  const [editMembers, setEditMembers] = useState<CharacterRecord[]>([]);
  const steps = settings.reviewSteps;
  const { due: dueRecords, sets, planSetNr: selectedPlanSet, plan: planRows, frequentlyWrong, marked } = view;
  const selectedEditSet = editSet ?? sets[0] ?? null;

  async function refreshRecords() {
    setRecords(await logger.time('Load characters', () => repository.list()));
  }

  useEffect(() => {
    let cancelled = false;
    void loadView(store, today, planSet).then(
      (next) => {
        if (!cancelled) setView(next);
      },
      (err: unknown) => {
        logger.error('Could not load review data', err);
        setNotice({ kind: 'error', text: 'Could not load review data.' });
      }
    );
    return () => {
      cancelled = true;
    };
  }, [store, records, today, planSet]);

  useEffect(() => {
    void (async () => {
      const loaded = await loadSettings();
      setSettings(loaded);
      setLadderText(loaded.reviewSteps.join(','));
      await seedDemoSetIfEmpty(loaded, today);
      await refreshRecords();
    })();
  }, [today]);

  useEffect(() => {
    if (selectedEditSet === null) return;
    void store.setLearnedDate(selectedEditSet).then(
      (d) => setSetDateDraft(d ?? today),
      (err: unknown) => {
        logger.warn('Could not read set date', { setNr: selectedEditSet, err });
        setSetDateDraft(today);
      }
    );
  }, [store, selectedEditSet, today]);

  useEffect(() => {
    if (selectedEditSet === null) {
      setEditMembers([]);
      return;
    }
    let cancelled = false;
    void store.charactersInSet(selectedEditSet).then(
      (members) => {
        if (!cancelled) setEditMembers(members);
      },
      (err: unknown) => {
        logger.error('Could not load set members', err);
        setNotice({ kind: 'error', text: `Could not load set ${selectedEditSet}.` });
      }
    );
    return () => {
      cancelled = true;
    };
  }, [store, records, selectedEditSet]);

  async function run(label: string, fn: () => Promise<string>) {
    try {
      setNotice({ kind: 'success', text: await fn() });
    } catch (err) {
      if (!isAppError(err)) throw err;
      logger.warn(`${label} rejected`, { code: err.code, message: err.message });
      setNotice({ kind: 'error', text: err.message });
    }
    await refreshRecords();
  }

  function grade(record: CharacterRecord, outcome: Outcome) {
    void run('Grade', async () => {
      await store.recordOutcome(record.id, outcome);
      return `Marked ${record.character} as ${outcome}.`;
    });
  }

  function toggleDay(record: CharacterRecord, step: number, value: boolean) {
    void run('Day toggle', async () => {
      await store.setDayReviewed(record.id, step, value, today);
      return `${record.character}: day ${step} ${value ? 'reviewed' : 'not reviewed'}.`;
    });
  }

  function toggleMark(record: CharacterRecord, value: boolean) {
    void run('Mark', async () => {
      await store.setMarked(record.id, value);
      return `${record.character} ${value ? 'marked' : 'unmarked'}.`;
    });
  }

  function addCharacter(setNr: number, learnedDate: CalendarDate | null) {
    void run('Add character', async () => {
      const added = await store.addCharacter({ ...draft, setNr, learnedDate });
      setDraft({ ...draft, character: '', pinyin: '', example: '' });
      return `Character '${added.character}' added to set ${added.setNr}!`;
    });
  }

  function saveCharacter(record: CharacterRecord) {
    const edit = edits[record.id] ?? { pinyin: record.pinyin, example: record.example };
    void run('Edit character', async () => {
      await store.updateCharacter(record.id, edit);
      return `${record.character} updated`;
    });
  }

  function deleteCharacter(record: CharacterRecord) {
    void run('Delete character', async () => {
      await store.deleteCharacter(record.id);
      setConfirmDelete({ ...confirmDelete, [record.id]: false });
      return `${record.character} deleted`;
    });
  }

  function updateSetDate(setNr: number) {
    void run('Update set date', async () => {
      await store.updateSetDate(setNr, setDateDraft);
      return 'Set learned date updated for all characters.';
    });
  }

  function deleteSet(setNr: number) {
    void run('Delete set', async () => {
      const count = await store.deleteSet(setNr);
      setConfirmDelete({ ...confirmDelete, [`set-${setNr}`]: false });
      setEditSet(null);
      setPlanSet(null);
      return `Set ${setNr} has been deleted (${count} characters).`;
    });
  }

  function applyImport() {
    void run('Import', async () => {
      const parsed = parseCsv(importText, steps, settings.progressSchema);
      const count = await store.importRecords(parsed);
      setImportText('');
      return `Imported ${count} characters.`;
    });
  }

  function exportCsv(dueOnly: boolean) {
    downloadText(dueOnly ? `due-${today}.csv` : 'character_data.csv', toCsv(dueOnly ? dueRecords : records, steps), 'text/csv');
  }

  async function updateSettings(next: Settings) {
    setSettings(next);
    await saveSettings(next);
  }

  function applyLadder() {
    const parsed = ladderText.split(',').map((v) => v.trim()).filter(Boolean).map(Number);
    if (!isValidLadder(parsed)) {
      setNotice({ kind: 'error', text: 'Review days must be ascending whole numbers, e.g. 0,1,2,4,7' });
      return;
    }
    void updateSettings({ ...settings, reviewSteps: parsed });
  }

  if (!unlocked) {
    return <div className="app"><header><h1>📚 汉字学习</h1></header><PassphraseGate onUnlock={() => setUnlocked(true)} /></div>;
  }

  return (
    <div className="app">
      <header>
        <h1>📚 汉字学习</h1>
        <nav>{screens.map((s) => <button key={s} className={s === screen ? 'active' : ''} onClick={() => { setScreen(s); setNotice(null); }}>{s}</button>)}</nav>
      </header>

      {notice && <p className={notice.kind}>{notice.text}</p>}

      {screen === 'flashcards' && <section><h2>🎴 Today's Review ({today})</h2>
        {!dueRecords.length ? <p className="success">No reviews due today! 🎉</p> : dueRecords.map((r) => {
          const step = dueStep(r, today, steps);
          return <div className="card" key={r.id}>
            <div className="characters-text">{r.character}</div>
            <button onClick={() => setRevealed({ ...revealed, [r.id]: !revealed[r.id] })}>👀 {revealed[r.id] ? 'Hide' : 'Show'} Hint</button>
            {revealed[r.id] && <ul><li><strong>Pinyin:</strong> {r.pinyin}</li><li><strong>Example:</strong> {r.example}</li></ul>}
            {r.progress.schema === 'tally' ? <>
              <p>Right: {r.progress.correct} | Wrong: {r.progress.wrong}</p>
              <button onClick={() => grade(r, 'correct')}>✅ Right</button>
              <button onClick={() => grade(r, 'wrong')}>❌ Wrong</button>
            </> : <>
              {step !== undefined && step > 0 && <label><input type="checkbox" checked={r.progress.reviewedOnDay[step] === true} onChange={(e) => toggleDay(r, step, e.target.checked)} /> Reviewed (Day {step})</label>}
              <label><input type="checkbox" checked={r.progress.marked} onChange={(e) => toggleMark(r, e.target.checked)} /> Mark</label>
            </>}
          </div>;
        })}
      </section>}

      {screen === 'dashboard' && <section><h2>📊 Dashboard</h2>
        <h3>📅 Review Plan</h3>
        <label>Filter by Set Number: <select value={selectedPlanSet ?? ''} onChange={(e) => setPlanSet(Number(e.target.value))}>{sets.map((s) => <option key={s} value={s}>{s}</option>)}</select></label>
        <table><thead><tr><th>Set</th><th>Character</th><th>Learned</th><th>Right</th><th>Wrong</th>{planRows[0]?.cells.map((c) => <th key={c.step}>{c.label}</th>)}</tr></thead>
          <tbody>{planRows.map((row) => <tr key={row.id}><td>{row.setNr}</td><td>{row.character}</td><td>{row.learnedDate ?? '--'}</td><td>{row.tally?.correct ?? '--'}</td><td>{row.tally?.wrong ?? '--'}</td>{row.cells.map((c) => <td key={c.step} title={c.label}>{planCellSymbol(c.status)}</td>)}</tr>)}</tbody>
        </table>
        <h3>📉 Frequently Wrong Characters</h3>
        <ul>{frequentlyWrong.map((r) => <li key={r.id}>{r.character} (Wrong: {r.progress.schema === 'tally' ? r.progress.wrong : 0})</li>)}</ul>
        <h3>🔖 Marked Characters</h3>
        <ul>{marked.map((r) => <li key={r.id}>{r.character} (set {r.setNr})</li>)}</ul>
      </section>}

      {screen === 'maintain' && <section><h2>🗂 Maintain Sets</h2>
        <nav>{maintainActions.map((a) => <label key={a}><input type="radio" checked={action === a} onChange={() => setAction(a)} /> {a} set</label>)}</nav>

        {action === 'new' && <form onSubmit={(e) => { e.preventDefault(); addCharacter(draft.setNr, draft.learnedDate); }}>
          <h3>➕ Add New Character to a New Set</h3>
          <label>New Set Number <input type="number" min={1} value={draft.setNr} onChange={(e) => setDraft({ ...draft, setNr: Number(e.target.value) })} /></label>
          <label>Learned Date for Set <input type="date" value={draft.learnedDate ?? ''} onChange={(e) => setDraft({ ...draft, learnedDate: dateInputValue(e.target.value) })} /></label>
          <label>Character <input value={draft.character} onChange={(e) => setDraft({ ...draft, character: e.target.value })} /></label>
          <label>Pinyin <input value={draft.pinyin} onChange={(e) => setDraft({ ...draft, pinyin: e.target.value })} /></label>
          <label>Example sentence <input value={draft.example} onChange={(e) => setDraft({ ...draft, example: e.target.value })} /></label>
          <button type="submit">Add Character to New Set</button>
        </form>}

        {action === 'edit' && selectedEditSet !== null && <div>
          <h3>✏️ Edit Existing Set</h3>
          <label>Select Set to Edit: <select value={selectedEditSet} onChange={(e) => setEditSet(Number(e.target.value))}>{sets.map((s) => <option key={s} value={s}>{s}</option>)}</select></label>
          <label>Update Learned Date for Set: <input type="date" value={setDateDraft ?? ''} onChange={(e) => setSetDateDraft(dateInputValue(e.target.value))} /></label>
          <button onClick={() => updateSetDate(selectedEditSet)}>Update Set Date</button>
          <h4>✏️ Edit Characters in This Set</h4>
          {editMembers.map((r) => {
            const edit = edits[r.id] ?? { pinyin: r.pinyin, example: r.example };
            return <details key={r.id}><summary>{r.character}</summary>
              <label>Pinyin <input value={edit.pinyin} onChange={(e) => setEdits({ ...edits, [r.id]: { ...edit, pinyin: e.target.value } })} /></label>
              <label>Example <input value={edit.example} onChange={(e) => setEdits({ ...edits, [r.id]: { ...edit, example: e.target.value } })} /></label>
              <button onClick={() => saveCharacter(r)}>Save {r.character}</button>
              <label><input type="checkbox" checked={confirmDelete[r.id] === true} onChange={(e) => setConfirmDelete({ ...confirmDelete, [r.id]: e.target.checked })} /> ⚠️ Confirm delete {r.character}</label>
              {confirmDelete[r.id] && <button onClick={() => deleteCharacter(r)}>Delete {r.character}</button>}
            </details>;
          })}
          <form onSubmit={(e) => { e.preventDefault(); addCharacter(selectedEditSet, setDateDraft); }}>
            <h4>➕ Add Character to This Set</h4>
            <label>Character <input value={draft.character} onChange={(e) => setDraft({ ...draft, character: e.target.value })} /></label>
            <label>Pinyin <input value={draft.pinyin} onChange={(e) => setDraft({ ...draft, pinyin: e.target.value })} /></label>
            <label>Example sentence <input value={draft.example} onChange={(e) => setDraft({ ...draft, example: e.target.value })} /></label>
            <button type="submit">Add Character</button>
          </form>
        </div>}

        {action === 'delete' && selectedEditSet !== null && <div>
          <h3>❌ Delete Entire Set</h3>
          <label>Select Set to Delete: <select value={selectedEditSet} onChange={(e) => setEditSet(Number(e.target.value))}>{sets.map((s) => <option key={s} value={s}>{s}</option>)}</select></label>
          <label><input type="checkbox" checked={confirmDelete[`set-${selectedEditSet}`] === true} onChange={(e) => setConfirmDelete({ ...confirmDelete, [`set-${selectedEditSet}`]: e.target.checked })} /> ⚠️ I confirm I want to delete this set</label>
          {confirmDelete[`set-${selectedEditSet}`] && <button onClick={() => deleteSet(selectedEditSet)}>Confirm Delete Set</button>}
        </div>}
      </section>}

      {screen === 'import' && <section><h2>Import / Export</h2>
        <textarea value={importText} onChange={(e) => setImportText(e.target.value)} placeholder="set_nr,character,pinyin,example,learned_date,correct,wrong" rows={8} />
        <button onClick={applyImport} disabled={!importText.trim()}>Import CSV</button>
        <button onClick={() => exportCsv(false)}>Export CSV (all)</button>
        <button onClick={() => exportCsv(true)}>Export CSV (due today)</button>
      </section>}

      {screen === 'settings' && <section><h2>Settings</h2>
        <label>Progress tracking for new characters
          <select value={settings.progressSchema} onChange={(e) => void updateSettings({ ...settings, progressSchema: e.target.value === 'perDay' ? 'perDay' : 'tally' })}>
            <option value="tally">Right / wrong tally</option><option value="perDay">Reviewed flag per day</option>
          </select>
        </label>
        <label>Frequently wrong from <input type="number" min={1} value={settings.frequentWrongThreshold} onChange={(e) => void updateSettings({ ...settings, frequentWrongThreshold: Number(e.target.value) })} /> wrong answers</label>
        <label>Review days <input value={ladderText} onChange={(e) => setLadderText(e.target.value)} /></label>
        <button onClick={applyLadder}>Save review days</button>
        <label><input type="checkbox" checked={settings.seedDemoSet} onChange={(e) => void updateSettings({ ...settings, seedDemoSet: e.target.checked })} /> Seed a demo set into an empty collection</label>
      </section>}
    </div>
  );
}
