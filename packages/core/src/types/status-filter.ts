/** Which todos a listing shows, by completion */
export const StatusFilter = {
  All: 'all',
  Active: 'active',
  Completed: 'completed',
} as const;

export type StatusFilter = (typeof StatusFilter)[keyof typeof StatusFilter];
