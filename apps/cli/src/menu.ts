/**
 * Interactive numbered menu. Every prompt accepts "cancel" or "x" to return
 * to the main menu; invalid answers are asked again with the validator's
 * message.
 */

import {
  activeTasks, filterTasks, sortTasks, today, errorMessage, logger,
  validateName, validateDeadline, validatePriority, validateCategoryRef, validateProjectRef,
  TaskStatus,
} from '@taskbook/core';
import type { TaskRepository, TaskField, Task, ValidationIssue, Reference } from '@taskbook/core';
import * as out from './output.js';
import type { Prompter } from './prompt.js';
import { InputClosedError } from './prompt.js';
import { parsePriorityArg, parseSortKey, resolveDateInput, normalizeFieldValue } from './helpers.js';
import { formatReferences } from './commands/refs.js';

export class PromptCancelled extends Error {
  constructor() {
    super('Canceled');
    this.name = 'PromptCancelled';
  }
}

const MAIN_MENU = [
  '1 - Add a new task',
  '2 - Review deadlines',
  '3 - View tasks list',
  '4 - Update a task',
  '5 - Delete (archive) a task',
  '6 - Mark a task as completed',
  '7 - View tasks by project',
  '8 - View tasks by priority',
  '9 - View tasks by category',
  '0 - Exit',
];

const FIELD_MENU: readonly [string, TaskField][] = [
  ['1', 'name'],
  ['2', 'deadline'],
  ['3', 'priority'],
  ['4', 'notes'],
  ['5', 'status'],
  ['6', 'category'],
  ['7', 'project'],
];

export class TaskMenu {
  constructor(
    private readonly repo: TaskRepository,
    private readonly prompter: Prompter,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  /** Loop until the user exits or input ends */
  async run(): Promise<void> {
    for (;;) {
      console.log('');
      out.info('Please select an option:');
      for (const line of MAIN_MENU) out.info(line);

      let choice: string;
      try {
        choice = (await this.prompter.ask('Enter your choice: ')).trim();
      } catch (err: unknown) {
        if (err instanceof InputClosedError) return;
        throw err;
      }

      if (choice === '0') {
        out.success('Exiting Task Manager. Goodbye!');
        return;
      }
      const action = this.actionFor(choice);
      if (!action) {
        out.error('Invalid option. Please try again.');
        continue;
      }
      if (!(await this.runAction(action))) return;
    }
  }

  private actionFor(choice: string): (() => Promise<void>) | null {
    switch (choice) {
      case '1': return () => this.addTask();
      case '2': return () => this.reviewDeadlines();
      case '3': return () => this.viewTasks();
      case '4': return () => this.updateTask();
      case '5': return () => this.archiveTask();
      case '6': return () => this.markCompleted();
      case '7': return () => this.viewByProject();
      case '8': return () => this.viewByPriority();
      case '9': return () => this.viewByCategory();
      default: return null;
    }
  }

  /** Resolves to false once input has ended */
  private async runAction(action: () => Promise<void>): Promise<boolean> {
    try {
      await action();
    } catch (err: unknown) {
      if (err instanceof InputClosedError) return false;
      if (err instanceof PromptCancelled) {
        out.info('Canceled. Returning to the main menu...');
        return true;
      }
      logger.debug({ err }, 'Menu action failed');
      out.error(errorMessage(err));
    }
    return true;
  }

  // --- Prompts ---

  private async ask(question: string): Promise<string> {
    const answer = (await this.prompter.ask(question)).trim();
    const lower = answer.toLowerCase();
    if (lower === 'cancel' || lower === 'x') throw new PromptCancelled();
    return answer;
  }

  /** Ask until `check` finds nothing wrong with the normalized answer */
  private async askValid(
    question: string,
    check: (value: string) => ValidationIssue | null,
    normalize: (answer: string) => string = answer => answer,
  ): Promise<string> {
    for (;;) {
      const value = normalize(await this.ask(question));
      const issue = check(value);
      if (!issue) return value;
      out.printIssue(issue);
    }
  }

  private showReferences(title: string, refs: readonly Reference[]): void {
    for (const line of formatReferences(title, refs)) console.log(line);
  }

  private referenceIds(refs: readonly Reference[]): Set<string> {
    return new Set(refs.map(r => r.id));
  }

  /** Ask for the id of a task that may still be changed */
  private async askActiveTask(question: string): Promise<Task | null> {
    const id = await this.ask(question);
    const task = this.repo.getActiveTask(id);
    if (!task) out.error(`Task ID ${id} not found.`);
    return task ?? null;
  }

  private showTable(tasks: readonly Task[], emptyMessage?: string): void {
    out.printTaskTable(tasks, today(this.clock()), emptyMessage);
  }

  private active(): Task[] {
    return activeTasks(this.repo.getTasks());
  }

  // --- Actions ---

  private async addTask(): Promise<void> {
    out.info('\n--- Add a New Task --- (type "cancel" or "x" at any prompt to go back)');
    const now = this.clock();

    const name = await this.askValid('Task name: ', validateName);
    const deadline = await this.askValid(
      'Deadline (YYYY-MM-DD, today, tomorrow, +3d, +2w): ',
      value => validateDeadline(value, now),
      answer => resolveDateInput(answer, now),
    );
    const priority = await this.askValid(
      'Priority (High, Medium, Low): ',
      validatePriority,
      answer => parsePriorityArg(answer) ?? answer,
    );

    const categories = this.repo.getCategories();
    this.showReferences('Categories', categories);
    const categoryId = await this.askValid(
      'Category ID: ',
      value => validateCategoryRef(value, this.referenceIds(categories)),
    );

    const projects = this.repo.getProjects();
    this.showReferences('Projects', projects);
    const projectId = await this.askValid(
      'Project ID: ',
      value => validateProjectRef(value, this.referenceIds(projects)),
    );

    const notes = await this.ask('Notes (optional): ');

    const result = await this.repo.add({ name, deadline, priority, categoryId, projectId, notes }, now);
    if (result.type === 'success') {
      for (const w of result.data.warnings) out.warning(w);
    }
    out.printResult(result);
  }

  private async reviewDeadlines(): Promise<void> {
    this.showTable(sortTasks(this.active(), 'deadline'));
  }

  private async viewTasks(): Promise<void> {
    const answer = await this.ask('Sort by (priority, deadline, status, project, name) or press Enter: ');
    const tasks = this.active();
    if (!answer) {
      this.showTable(tasks);
      return;
    }
    const key = parseSortKey(answer);
    if (!key) {
      out.warning(`Invalid sort option: '${answer}'. Displaying tasks without sorting.`);
      this.showTable(tasks);
      return;
    }
    this.showTable(sortTasks(tasks, key));
  }

  private async updateTask(): Promise<void> {
    this.showTable(this.active());
    const task = await this.askActiveTask('Enter the ID of the task to update: ');
    if (!task) return;

    for (const line of out.formatTaskDetails(task)) console.log(line);
    out.info('Fields: ' + FIELD_MENU.map(([n, f]) => `${n} - ${f}`).join(', '));
    const choice = await this.ask('Select a field to update: ');
    const field = FIELD_MENU.find(([n, f]) => n === choice || f === choice.toLowerCase())?.[1];
    if (!field) {
      out.error('Invalid field choice.');
      return;
    }
    if (field === 'category') this.showReferences('Categories', this.repo.getCategories());
    if (field === 'project') this.showReferences('Projects', this.repo.getProjects());

    for (;;) {
      const now = this.clock();
      const value = normalizeFieldValue(field, await this.ask(`New ${field}: `), now);
      const result = await this.repo.updateField(task.id, { field, value }, now);
      if (result.type === 'invalid') {
        out.printIssue(result.issue);
        continue;
      }
      if (result.type === 'success') {
        for (const w of result.data.warnings) out.warning(w);
      }
      out.printResult(result);
      return;
    }
  }

  private async archiveTask(): Promise<void> {
    this.showTable(this.active());
    const task = await this.askActiveTask('Enter the ID of the task to delete: ');
    if (!task) return;

    const confirm = await this.ask(`Archive task '${task.name}'? (y/n): `);
    if (confirm.toLowerCase() !== 'y') {
      out.info('Task deletion canceled. Returning to the main menu...');
      return;
    }
    out.printResult(await this.repo.archive(task.id));
  }

  private async markCompleted(): Promise<void> {
    const open = this.active().filter(t => t.status !== TaskStatus.Completed);
    if (open.length === 0) {
      out.info('No tasks available to mark as completed.');
      return;
    }
    out.info('\n--- Mark a Task as Completed ---');
    for (const t of open) out.info(`ID: ${t.id}, Name: ${t.name}, Status: ${t.status}`);

    const id = await this.ask('Enter the ID of the task you want to mark as completed: ');
    out.printResult(await this.repo.markCompleted(id, this.clock()));
  }

  private async viewByProject(): Promise<void> {
    const projects = this.repo.getProjects();
    this.showReferences('Projects', projects);
    const projectId = await this.askValid(
      'Project ID: ',
      value => validateProjectRef(value, this.referenceIds(projects)),
    );
    this.showTable(filterTasks(this.active(), { projectId }), 'No tasks for this project.');
  }

  private async viewByCategory(): Promise<void> {
    const categories = this.repo.getCategories();
    this.showReferences('Categories', categories);
    const categoryId = await this.askValid(
      'Category ID: ',
      value => validateCategoryRef(value, this.referenceIds(categories)),
    );
    this.showTable(filterTasks(this.active(), { categoryId }), 'No tasks for this category.');
  }

  private async viewByPriority(): Promise<void> {
    const answer = await this.askValid(
      'Priority (High, Medium, Low): ',
      validatePriority,
      a => parsePriorityArg(a) ?? a,
    );
    const priority = parsePriorityArg(answer);
    if (!priority) return;
    this.showTable(filterTasks(this.active(), { priority }), `No tasks with ${priority} priority.`);
  }
}
