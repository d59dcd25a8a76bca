export function nowIso(): string {
  return new Date().toISOString();
}

export function unixSeconds(date: Date = new Date()): number {
  return Math.floor(date.getTime() / 1000);
}
