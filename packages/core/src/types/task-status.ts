export const TaskStatus = {
  Pending: 'Pending',
  InProgress: 'In Progress',
  Completed: 'Completed',
  Deleted: 'Deleted',
} as const;

export type TaskStatus = (typeof TaskStatus)[keyof typeof TaskStatus];

/** Statuses a user may set directly. Deleted is only applied by archiving. */
export type UserStatus = Exclude<TaskStatus, typeof TaskStatus.Deleted>;

export const USER_STATUSES: readonly UserStatus[] = [
  TaskStatus.Pending,
  TaskStatus.InProgress,
  TaskStatus.Completed,
];

const ALL_STATUSES: readonly TaskStatus[] = [...USER_STATUSES, TaskStatus.Deleted];

export function isTaskStatus(value: string): value is TaskStatus {
  return (ALL_STATUSES as readonly string[]).includes(value);
}

export function isUserStatus(value: string): value is UserStatus {
  return (USER_STATUSES as readonly string[]).includes(value);
}
