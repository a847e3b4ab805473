/**
 * In-memory copy of the sheet tables plus the indexes derived from them.
 * The cache is only ever replaced as a whole on refresh, or patched after a
 * remote write has succeeded.
 */

import type { Reference, TaskId } from '../types/task.js';
import type { ReferenceIds } from '../validation/validators.js';
import { logger } from '../logger.js';
import { type ReferenceLookup, UNKNOWN_CATEGORY, UNKNOWN_PROJECT, rowTaskId } from './task-record.js';

/** Raw table contents, header row first */
export interface SheetSnapshot {
  readonly tasks: readonly (readonly string[])[];
  readonly projects: readonly (readonly string[])[];
  readonly categories: readonly (readonly string[])[];
  readonly archive: readonly (readonly string[])[];
}

/** A data row of the tasks table and its 1-based sheet row number */
export interface TaskRow {
  readonly row: number;
  readonly cells: readonly string[];
}

function toReferences(rows: readonly (readonly string[])[]): Reference[] {
  return rows.slice(1)
    .map(cells => ({ id: (cells[0] ?? '').trim(), name: cells[1] ?? '' }))
    .filter(ref => ref.id !== '');
}

export class TaskCache implements ReferenceLookup {
  private taskRowCells: string[][] = [];
  private archiveRows: string[][] = [];
  private projectRefs: Reference[] = [];
  private categoryRefs: Reference[] = [];
  private readonly rowIndex = new Map<TaskId, number>();
  private readonly projectNames = new Map<string, string>();
  private readonly categoryNames = new Map<string, string>();

  /** Swap in a freshly read snapshot and rebuild every index */
  replace(snapshot: SheetSnapshot): void {
    this.taskRowCells = snapshot.tasks.map(cells => [...cells]);
    this.archiveRows = snapshot.archive.slice(1).map(cells => [...cells]);
    this.projectRefs = toReferences(snapshot.projects);
    this.categoryRefs = toReferences(snapshot.categories);

    this.projectNames.clear();
    for (const ref of this.projectRefs) this.projectNames.set(ref.id, ref.name);
    this.categoryNames.clear();
    for (const ref of this.categoryRefs) this.categoryNames.set(ref.id, ref.name);

    this.rowIndex.clear();
    for (const { row, cells } of this.taskRows()) {
      const id = rowTaskId(cells);
      if (!id) continue;
      if (this.rowIndex.has(id)) {
        logger.warn({ id, row }, 'Duplicate task id in the tasks sheet; keeping the first row');
        continue;
      }
      this.rowIndex.set(id, row);
    }
  }

  /** Data rows of the tasks table, header excluded */
  taskRows(): TaskRow[] {
    return this.taskRowCells
      .map((cells, i) => ({ row: i + 1, cells }))
      .slice(1);
  }

  rowOf(id: TaskId): number | undefined {
    return this.rowIndex.get(id);
  }

  /** Record a row the store has just appended */
  appendTaskRow(row: number, cells: readonly string[]): void {
    while (this.taskRowCells.length < row - 1) this.taskRowCells.push([]);
    this.taskRowCells[row - 1] = [...cells];
    const id = rowTaskId(cells);
    if (id) this.rowIndex.set(id, row);
  }

  /** Mirror a contiguous cell write the store has just accepted */
  setTaskCells(row: number, column: number, values: readonly string[]): void {
    const cells = this.taskRowCells[row - 1];
    if (!cells) return;
    while (cells.length < column - 1) cells.push('');
    values.forEach((value, i) => {
      cells[column - 1 + i] = value;
    });
  }

  archivedRows(): readonly (readonly string[])[] {
    return this.archiveRows;
  }

  archivedIds(): TaskId[] {
    return this.archiveRows.map(cells => rowTaskId(cells)).filter(id => id !== '');
  }

  projects(): readonly Reference[] {
    return this.projectRefs;
  }

  categories(): readonly Reference[] {
    return this.categoryRefs;
  }

  categoryName(id: string): string {
    return this.categoryNames.get(id) ?? UNKNOWN_CATEGORY;
  }

  projectName(id: string): string {
    return this.projectNames.get(id) ?? UNKNOWN_PROJECT;
  }

  referenceIds(): ReferenceIds {
    return {
      categoryIds: new Set(this.categoryNames.keys()),
      projectIds: new Set(this.projectNames.keys()),
    };
  }
}
