const pad = (n: number) => (n < 10 ? `0${n}` : String(n));

/**
 * Format a Date (or date-like) into a filename-safe local stamp: "YYYYMMDD_HHmmss"
 */
export function formatFileTimestamp(input: Date | string = new Date()): string {
  const d = input instanceof Date ? input : new Date(input);

  const year = d.getFullYear();
  const month = pad(d.getMonth() + 1);
  const day = pad(d.getDate());
  const hours = pad(d.getHours());
  const minutes = pad(d.getMinutes());
  const seconds = pad(d.getSeconds());

  return `${year}${month}${day}_${hours}${minutes}${seconds}`;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
