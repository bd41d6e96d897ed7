function pad2(n: number) {
  return n.toString().padStart(2, "0");
}
function pad3(n: number) {
  return n.toString().padStart(3, "0");
}

/** HH:MM:SS{sep}mmm with unbounded hours. */
export function formatTimestamp(ms: number, separator: "," | "."): string {
  const total = Math.max(0, Math.round(ms));
  const h = Math.floor(total / 3600000);
  const m = Math.floor((total % 3600000) / 60000);
  const s = Math.floor((total % 60000) / 1000);
  const msPart = total % 1000;
  return `${pad2(h)}:${pad2(m)}:${pad2(s)}${separator}${pad3(msPart)}`;
}

const TIMESTAMP_RE = /^(?:(\d+):)?([0-5]?\d):([0-5]?\d)[,.](\d{1,3})$/;

/** Accepts both separators and the short MM:SS.mmm form WebVTT allows. */
export function parseTimestamp(value: string): number | null {
  const match = TIMESTAMP_RE.exec(value.trim());
  if (!match) return null;
  const [, h, m, s, frac] = match;
  const ms = parseInt(frac.padEnd(3, "0"), 10);
  return (h ? parseInt(h, 10) : 0) * 3600000 + parseInt(m, 10) * 60000 + parseInt(s, 10) * 1000 + ms;
}

/** Human readable duration for logs and estimates. */
export function formatDuration(ms: number): string {
  const seconds = ms / 1000;
  if (seconds < 60) return `${seconds.toFixed(1)} seconds`;
  if (seconds < 3600) return `${(seconds / 60).toFixed(1)} minutes`;
  return `${(seconds / 3600).toFixed(1)} hours`;
}
