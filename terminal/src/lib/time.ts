/** Format an ISO timestamp as 24-hour `HH:MM:SS` in UTC. */
export function shortTime(iso: string | null): string {
  if (!iso) {
    return "—";
  }
  const d = new Date(iso);
  if (Number.isNaN(d.getTime())) {
    return iso;
  }
  return d.toISOString().slice(11, 19);
}
