export const Priority = {
  High: 'High',
  Medium: 'Medium',
  Low: 'Low',
} as const;

export type Priority = (typeof Priority)[keyof typeof Priority];

export const PRIORITIES: readonly Priority[] = [Priority.High, Priority.Medium, Priority.Low];

/** Sort rank: High first, blank priority last */
export const PriorityRank: Record<Priority, number> = {
  [Priority.High]: 1,
  [Priority.Medium]: 2,
  [Priority.Low]: 3,
};

export const EMPTY_PRIORITY_RANK = 4;

export function isPriority(value: string): value is Priority {
  return (PRIORITIES as readonly string[]).includes(value);
}
