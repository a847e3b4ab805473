import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { SqliteSheetStore, createTestStore } from '../../src/store/sqlite-sheet-store.js';
import { openWorkbook } from '../../src/db.js';
import { RemoteRejectedError } from '../../src/errors.js';
import { logger } from '../../src/logger.js';

let store: SqliteSheetStore;

beforeEach(async () => {
  store = createTestStore();
  await store.createTableIfAbsent('tasks', ['id', 'name', 'status']);
});

describe('SqliteSheetStore', () => {
  it('creates a table once', async () => {
    expect(await store.createTableIfAbsent('tasks', ['id'])).toBe(false);
    expect(await store.readAll('tasks')).toEqual([['id', 'name', 'status']]);
  });

  it('writes the header into an existing table whose first row is empty', async () => {
    await store.updateCells('tasks', 1, 1, ['', '', '']);

    expect(await store.createTableIfAbsent('tasks', ['id', 'name', 'status'])).toBe(false);
    expect(await store.readAll('tasks')).toEqual([['id', 'name', 'status']]);
  });

  it('appends rows and reports their position', async () => {
    expect(await store.appendRow('tasks', ['1', 'First', 'Pending'])).toBe(2);
    expect(await store.appendRow('tasks', ['2', 'Second', 'Pending'])).toBe(3);
    expect(await store.readAll('tasks')).toEqual([
      ['id', 'name', 'status'],
      ['1', 'First', 'Pending'],
      ['2', 'Second', 'Pending'],
    ]);
  });

  it('drops trailing blank cells like the remote store', async () => {
    await store.appendRow('tasks', ['1', 'First', '']);
    expect((await store.readAll('tasks'))[1]).toEqual(['1', 'First']);
  });

  it('updates contiguous cells and pads short rows', async () => {
    await store.appendRow('tasks', ['1']);
    await store.updateCells('tasks', 2, 3, ['Completed']);
    await store.updateCells('tasks', 2, 2, ['Renamed']);
    expect((await store.readAll('tasks'))[1]).toEqual(['1', 'Renamed', 'Completed']);
  });

  it('shifts rows up after a delete', async () => {
    await store.appendRow('tasks', ['1']);
    await store.appendRow('tasks', ['2']);
    await store.appendRow('tasks', ['3']);
    await store.deleteRow('tasks', 3);
    expect(await store.readAll('tasks')).toEqual([['id', 'name', 'status'], ['1'], ['3']]);
    expect(await store.appendRow('tasks', ['4'])).toBe(4);
  });

  it('rejects unknown sheets and rows', async () => {
    await expect(store.readAll('missing')).rejects.toBeInstanceOf(RemoteRejectedError);
    await expect(store.deleteRow('tasks', 9)).rejects.toThrow("Row 9 does not exist in 'tasks'");
    await expect(store.updateCells('tasks', 0, 1, ['x'])).rejects.toMatchObject({ status: 400 });
  });
});

describe('corrupt rows', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reads an unparseable row as empty and logs it', async () => {
    const warn = vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
    const workbook = openWorkbook(':memory:');
    const local = new SqliteSheetStore(workbook);
    await local.createTableIfAbsent('tasks', ['id']);
    await local.appendRow('tasks', ['1']);
    workbook.sqlite.prepare('UPDATE sheet_rows SET cells = ? WHERE position = 2').run('{broken');

    expect(await local.readAll('tasks')).toEqual([['id'], []]);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[1]).toBe('Unreadable workbook row, reading it as empty');
  });
});
