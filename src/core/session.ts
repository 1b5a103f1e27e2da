/** Appends a query to the session history, keeping the most recent `max`. */
export function appendHistory(history: readonly string[], query: string, max: number): string[] {
  const next = [...history, query.trim()];
  return next.length > max ? next.slice(next.length - max) : next;
}
