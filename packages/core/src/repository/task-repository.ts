/**
 * Task repository: loads the sheet tables into typed records and applies
 * every mutation remotely first, then to the cache. Remote failures propagate
 * and leave the cache untouched.
 */

import type { SheetStore, SheetNames } from '../store/sheet-store.js';
import { DEFAULT_SHEET_NAMES, REFERENCE_HEADER } from '../store/sheet-store.js';
import type { FieldUpdate, NewTaskInput, Reference, Task, TaskId } from '../types/task.js';
import type { DataResult, TaskChange } from '../types/results.js';
import { TaskStatus } from '../types/task-status.js';
import { PRIORITIES, isPriority } from '../types/priority.js';
import {
  type ValidationIssue,
  validateName, validateDeadline, validatePriority, validateStatus,
  validateCategoryRef, validateProjectRef, validateNotes, validateNewTask,
  MAX_NOTES_LENGTH,
} from '../validation/validators.js';
import { today } from '../dates.js';
import { logger } from '../logger.js';
import { errorMessage } from '../errors.js';
import { TaskCache, type SheetSnapshot } from './task-cache.js';
import {
  TASK_HEADER, ARCHIVE_HEADER, TaskColumn,
  rowToTask, taskToRow, rowTaskId, withStatus, completeTask, archiveTask,
  isArchived, parseStatusCell,
} from './task-record.js';

export type ReferenceKind = 'project' | 'category';

export interface CompactionSummary {
  readonly archivedIds: readonly TaskId[];
}

/** A validated field change: the new record and the contiguous cells to write */
interface PlannedWrite {
  readonly next: Task;
  readonly column: number;
  readonly values: readonly string[];
  readonly warnings: readonly string[];
}

const NOTES_TRUNCATED = `Notes exceed ${MAX_NOTES_LENGTH} characters and were truncated.`;
const RELOAD_FAILED = 'The task was saved, but the task list could not be reloaded.';

function archivedError(task: Task): { type: 'error'; message: string } {
  return { type: 'error', message: `Task ${task.id} is archived and cannot be changed.` };
}

export class TaskRepository {
  private readonly cache = new TaskCache();
  private tasks: Task[] = [];

  constructor(
    private readonly store: SheetStore,
    private readonly sheets: SheetNames = DEFAULT_SHEET_NAMES,
  ) {}

  async open(): Promise<void> {
    await this.ensureSheets();
    await this.refresh();
  }

  /** Create any missing table with its header row */
  async ensureSheets(): Promise<void> {
    const tables: [string, readonly string[]][] = [
      [this.sheets.tasks, TASK_HEADER],
      [this.sheets.projects, REFERENCE_HEADER],
      [this.sheets.categories, REFERENCE_HEADER],
      [this.sheets.archive, ARCHIVE_HEADER],
    ];
    for (const [sheet, header] of tables) {
      if (await this.store.createTableIfAbsent(sheet, header)) {
        logger.info({ sheet }, 'Created missing sheet');
      }
    }
  }

  /**
   * Re-read every table. The cache is replaced only when all reads succeed;
   * otherwise the last good data stays in place and the error is rethrown.
   */
  async refresh(): Promise<void> {
    const snapshot = await this.readSnapshot().catch((err: unknown) => {
      logger.error({ reason: errorMessage(err) }, 'Refresh failed; keeping previously loaded data');
      throw err;
    });
    this.cache.replace(snapshot);
    this.loadTasks();
    logger.debug({ tasks: this.tasks.length }, 'Loaded tasks');
  }

  /** Rebuild the task list from cached rows. Rows without an id are skipped. */
  loadTasks(): readonly Task[] {
    const seen = new Set<TaskId>();
    this.tasks = [];
    for (const { cells } of this.cache.taskRows()) {
      const id = rowTaskId(cells);
      if (!id || seen.has(id)) continue;
      seen.add(id);
      this.tasks.push(rowToTask(cells, this.cache));
    }
    return this.tasks;
  }

  /** Next id: one past the largest numeric id among loaded and archived tasks */
  generateId(): TaskId {
    let max = 0;
    for (const id of [...this.tasks.map(t => t.id), ...this.cache.archivedIds()]) {
      if (!/^\d+$/.test(id)) continue;
      max = Math.max(max, Number(id));
    }
    return String(max + 1);
  }

  getTasks(): readonly Task[] {
    return this.tasks;
  }

  /** Any task by id, archived ones included */
  getTask(id: TaskId): Task | undefined {
    return this.tasks.find(t => t.id === id);
  }

  getActiveTask(id: TaskId): Task | undefined {
    const task = this.getTask(id);
    return task && !isArchived(task) ? task : undefined;
  }

  getProjects(): readonly Reference[] {
    return this.cache.projects();
  }

  getCategories(): readonly Reference[] {
    return this.cache.categories();
  }

  /** Rows moved out by compaction, deletion date last */
  getArchivedRows(): readonly (readonly string[])[] {
    return this.cache.archivedRows();
  }

  async add(input: NewTaskInput, now: Date = new Date()): Promise<DataResult<TaskChange>> {
    const issue = validateNewTask(input, this.cache.referenceIds(), now);
    if (issue) return { type: 'invalid', issue };

    const notes = validateNotes(input.notes ?? '');
    const task: Task = {
      id: this.generateId(),
      name: input.name,
      createDate: input.createDate ?? today(now),
      deadline: input.deadline,
      completeDate: null,
      status: TaskStatus.Pending,
      priority: isPriority(input.priority) ? input.priority : null,
      category: { id: input.categoryId, name: this.cache.categoryName(input.categoryId) },
      project: { id: input.projectId, name: this.cache.projectName(input.projectId) },
      notes: notes.value,
    };
    const cells = taskToRow(task);

    const reported = await this.store.appendRow(this.sheets.tasks, cells);
    const warnings = notes.truncated ? [NOTES_TRUNCATED] : [];
    this.tasks.push(task);
    if (reported !== null) {
      this.cache.appendTaskRow(reported, cells);
    } else {
      // The row is written but its position is unknown; write() re-reads if this refresh fails
      try {
        await this.refresh();
      } catch (err: unknown) {
        logger.warn({ id: task.id, reason: errorMessage(err) }, 'Could not re-read tasks after adding');
        warnings.push(RELOAD_FAILED);
      }
    }

    logger.info({ id: task.id }, 'Added task');
    return {
      type: 'success',
      data: { task, warnings },
      message: `Task '${task.name}' added with ID ${task.id}.`,
    };
  }

  async updateField(id: TaskId, update: FieldUpdate, now: Date = new Date()): Promise<DataResult<TaskChange>> {
    const task = this.getTask(id);
    if (!task) return { type: 'not-found', taskId: id };
    if (isArchived(task)) return archivedError(task);

    const planned = this.planUpdate(task, update, now);
    if ('kind' in planned) return { type: 'invalid', issue: planned };

    if (taskToRow(planned.next).join('\u0000') === taskToRow(task).join('\u0000')) {
      return { type: 'no-change', message: `Task ${id} already has that ${update.field}.` };
    }

    await this.write(task, planned);
    return {
      type: 'success',
      data: { task: planned.next, warnings: planned.warnings },
      message: `Task ${id} ${update.field} updated.`,
    };
  }

  /** Idempotent: an already completed task keeps its completion date */
  async markCompleted(id: TaskId, now: Date = new Date()): Promise<DataResult<TaskChange>> {
    const task = this.getTask(id);
    if (!task) return { type: 'not-found', taskId: id };
    if (isArchived(task)) return archivedError(task);
    if (task.status === TaskStatus.Completed) {
      return { type: 'no-change', message: `Task '${task.name}' is already marked as completed.` };
    }

    const next = completeTask(task, today(now));
    await this.write(task, {
      next,
      column: TaskColumn.CompleteDate,
      values: [next.completeDate ?? '', next.status],
      warnings: [],
    });
    return { type: 'success', data: { task: next, warnings: [] }, message: `Task '${task.name}' marked as completed.` };
  }

  /** Soft delete: the row stays, its status becomes Deleted */
  async archive(id: TaskId): Promise<DataResult<TaskChange>> {
    const task = this.getTask(id);
    if (!task) return { type: 'not-found', taskId: id };
    if (isArchived(task)) {
      return { type: 'no-change', message: `Task ${id} is already archived.` };
    }

    const next = archiveTask(task);
    await this.write(task, { next, column: TaskColumn.Status, values: [next.status], warnings: [] });
    return { type: 'success', data: { task: next, warnings: [] }, message: `Task ${id} archived.` };
  }

  /**
   * Move every Deleted row to the archive sheet with today's date appended,
   * then remove them from the tasks sheet from the bottom up so earlier row
   * numbers stay valid. Always ends with a refresh.
   */
  async compactArchived(now: Date = new Date()): Promise<DataResult<CompactionSummary>> {
    const doomed = this.cache.taskRows()
      .filter(({ cells }) => rowTaskId(cells) !== '')
      .filter(({ cells }) => parseStatusCell(cells[TaskColumn.Status - 1] ?? '') === TaskStatus.Deleted)
      .sort((a, b) => b.row - a.row);
    if (doomed.length === 0) {
      return { type: 'no-change', message: 'There are no archived tasks to compact.' };
    }

    await this.store.createTableIfAbsent(this.sheets.archive, ARCHIVE_HEADER);
    const alreadyArchived = new Set(this.cache.archivedIds());
    const deletedDate = today(now);
    const moved: TaskId[] = [];

    try {
      for (const { row, cells } of doomed) {
        const id = rowTaskId(cells);
        if (!alreadyArchived.has(id)) {
          const padded = TASK_HEADER.map((_, i) => cells[i] ?? '');
          await this.store.appendRow(this.sheets.archive, [...padded, deletedDate]);
          alreadyArchived.add(id);
        }
        await this.store.deleteRow(this.sheets.tasks, row);
        moved.push(id);
      }
    } catch (err: unknown) {
      logger.error({ moved, reason: errorMessage(err) }, 'Compaction stopped part way');
      await this.refresh().catch((refreshErr: unknown) => {
        logger.error({ reason: errorMessage(refreshErr) }, 'Refresh after failed compaction also failed');
      });
      throw err;
    }

    await this.refresh();
    logger.info({ count: moved.length }, 'Compacted archived tasks');
    return {
      type: 'success',
      data: { archivedIds: moved },
      message: `Moved ${moved.length} archived task(s) to the ${this.sheets.archive} sheet.`,
    };
  }

  /** Add a project or category row. Ids must be new and non-blank. */
  async addReference(kind: ReferenceKind, id: string, name: string): Promise<DataResult<Reference>> {
    const refId = id.trim();
    const known = kind === 'project' ? this.cache.projects() : this.cache.categories();
    if (!refId || !name.trim()) {
      return { type: 'error', message: `A ${kind} needs both an id and a name.` };
    }
    if (known.some(ref => ref.id === refId)) {
      return { type: 'no-change', message: `A ${kind} with id ${refId} already exists.` };
    }

    const sheet = kind === 'project' ? this.sheets.projects : this.sheets.categories;
    await this.store.appendRow(sheet, [refId, name]);
    await this.refresh();
    return { type: 'success', data: { id: refId, name }, message: `Added ${kind} ${refId} (${name}).` };
  }

  private async readSnapshot(): Promise<SheetSnapshot> {
    const tasks = await this.store.readAll(this.sheets.tasks);
    const projects = await this.store.readAll(this.sheets.projects);
    const categories = await this.store.readAll(this.sheets.categories);
    const archive = await this.store.readAll(this.sheets.archive);
    return { tasks, projects, categories, archive };
  }

  private planUpdate(task: Task, update: FieldUpdate, now: Date): PlannedWrite | ValidationIssue {
    const plain = (next: Task, column: number, value: string): PlannedWrite =>
      ({ next, column, values: [value], warnings: [] });

    switch (update.field) {
      case 'name':
        return validateName(update.value)
          ?? plain({ ...task, name: update.value }, TaskColumn.Name, update.value);
      case 'deadline':
        return validateDeadline(update.value, now)
          ?? plain({ ...task, deadline: update.value }, TaskColumn.Deadline, update.value);
      case 'priority': {
        const issue = validatePriority(update.value);
        if (issue) return issue;
        const priority = PRIORITIES.find(p => p === update.value) ?? null;
        return plain({ ...task, priority }, TaskColumn.Priority, update.value);
      }
      case 'notes': {
        const notes = validateNotes(update.value);
        return {
          next: { ...task, notes: notes.value },
          column: TaskColumn.Notes,
          values: [notes.value],
          warnings: notes.truncated ? [NOTES_TRUNCATED] : [],
        };
      }
      case 'status': {
        const issue = validateStatus(update.value);
        if (issue) return issue;
        const status = parseStatusCell(update.value);
        const next = withStatus(task, status, today(now));
        return {
          next,
          column: TaskColumn.CompleteDate,
          values: [next.completeDate ?? '', next.status],
          warnings: [],
        };
      }
      case 'category': {
        const categoryId = update.value.trim();
        return validateCategoryRef(categoryId, this.cache.referenceIds().categoryIds)
          ?? plain(
            { ...task, category: { id: categoryId, name: this.cache.categoryName(categoryId) } },
            TaskColumn.Category,
            categoryId,
          );
      }
      case 'project': {
        const projectId = update.value.trim();
        return validateProjectRef(projectId, this.cache.referenceIds().projectIds)
          ?? plain(
            { ...task, project: { id: projectId, name: this.cache.projectName(projectId) } },
            TaskColumn.Project,
            projectId,
          );
      }
    }
  }

  /** Remote write first; the cache and task list follow only on success */
  private async write(task: Task, planned: PlannedWrite): Promise<void> {
    let row = this.cache.rowOf(task.id);
    if (row === undefined) {
      await this.refresh();
      row = this.cache.rowOf(task.id);
    }
    if (row === undefined) {
      throw new Error(`No sheet row is known for task ${task.id}`);
    }
    await this.store.updateCells(this.sheets.tasks, row, planned.column, planned.values);
    this.cache.setTaskCells(row, planned.column, planned.values);
    this.tasks = this.tasks.map(t => (t.id === task.id ? planned.next : t));
    logger.info({ id: task.id, column: planned.column }, 'Updated task');
  }
}
