export { TaskStatus, USER_STATUSES, isTaskStatus, isUserStatus } from './task-status.js';
export type { UserStatus } from './task-status.js';
export { Priority, PRIORITIES, PriorityRank, EMPTY_PRIORITY_RANK, isPriority } from './priority.js';
export { TASK_FIELDS } from './task.js';
export type { TaskId, Task, Reference, NewTaskInput, TaskField, FieldUpdate } from './task.js';
export type { TaskResult, DataResult, TaskChange } from './results.js';
