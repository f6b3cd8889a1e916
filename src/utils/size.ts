const UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

export function formatSize(bytes: number, decimals = 2): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024;
    unit += 1;
  }
  return `${value.toFixed(decimals)}${UNITS[unit]}`;
}

export function formatFileCount(count: number): string {
  return count === 1 ? '1 file' : `${count} files`;
}
