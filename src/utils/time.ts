function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/** Local-time `YYYYMMDD_HHMMSS`, used in artifact file names. */
export function formatTimestamp(date: Date): string {
  return (
    `${String(date.getFullYear())}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
