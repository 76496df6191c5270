function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** `backup_YYYYMMDD_HHMMSS`, in UTC. */
export function backupId(date: Date): string {
  const day = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
  const time = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
  return `backup_${day}_${time}`;
}
