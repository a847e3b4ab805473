// Task views
export {
  activeTasks,
  sortTasks,
  filterTasks,
  isOverdue,
  getStats,
  isSortKey,
  SORT_KEYS,
} from './task-view.js';
export type { SortKey, TaskFilter, TaskStats } from './task-view.js';
