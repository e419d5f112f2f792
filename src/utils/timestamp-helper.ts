function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, '0');
}

export type TimestampFormat = 'offset' | 'file';

/**
 * Timestamp formatting for records, result documents and file names
 */
export class TimestampHelper {
  static getTimestamp(format: TimestampFormat = 'offset', now: Date = new Date()): string {
    switch (format) {
      case 'offset':
        return this.formatWithOffset(now);
      case 'file':
        // Safe for filenames: YYYYMMDD_HHMMSS
        return `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}_` +
          `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
    }
  }

  /**
   * Local time with milliseconds and a numeric zone offset,
   * e.g. `2024-03-01T09:05:07.042+0100`.
   */
  static formatWithOffset(date: Date): string {
    const offsetMinutes = -date.getTimezoneOffset();
    const sign = offsetMinutes >= 0 ? '+' : '-';
    const absOffset = Math.abs(offsetMinutes);

    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
      `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}` +
      `.${pad(date.getMilliseconds(), 3)}` +
      `${sign}${pad(Math.floor(absOffset / 60))}${pad(absOffset % 60)}`;
  }

  static now(): string {
    return this.formatWithOffset(new Date());
  }
}
