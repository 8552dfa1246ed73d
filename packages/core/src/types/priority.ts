export const Priority = {
  High: 'high',
  Medium: 'medium',
  Low: 'low',
} as const;

export type Priority = (typeof Priority)[keyof typeof Priority];

export const PRIORITY_VALUES: readonly Priority[] = [Priority.Low, Priority.Medium, Priority.High];

export const DEFAULT_PRIORITY: Priority = Priority.Medium;

export const PriorityName: Record<Priority, string> = {
  [Priority.High]: 'High',
  [Priority.Medium]: 'Medium',
  [Priority.Low]: 'Low',
};

/** Severity rank used for sorting: lower sorts first */
export const PriorityRank: Record<Priority, number> = {
  [Priority.High]: 1,
  [Priority.Medium]: 2,
  [Priority.Low]: 3,
};

export function isPriority(value: string): value is Priority {
  return PRIORITY_VALUES.some(p => p === value);
}
