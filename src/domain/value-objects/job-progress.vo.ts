/**
 * Percent complete recorded on a job at each pipeline stage.
 * Rendering spreads across CLAIMED..RENDERED by finished formats.
 */
export const JobProgress = {
  PENDING: 0,
  CLAIMED: 5,
  RENDERED: 75,
  BUNDLED: 85,
  STORED: 95,
  COMPLETE: 100,
} as const;

export function renderProgress(rendered: number, total: number): number {
  if (total <= 0) {
    return JobProgress.RENDERED;
  }
  const span = JobProgress.RENDERED - JobProgress.CLAIMED;
  return JobProgress.CLAIMED + Math.floor((span * Math.min(rendered, total)) / total);
}

export function isValidProgress(value: number): boolean {
  return Number.isInteger(value) && value >= JobProgress.PENDING && value <= JobProgress.COMPLETE;
}
