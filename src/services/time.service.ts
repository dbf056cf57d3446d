import { ConfigError } from '../models/errors';

export type DialMode = '12h' | '24h';

export interface TimeValue {
  hours: number;
  minutes: number;
  /** May carry a fractional part for a sweeping second hand */
  seconds: number;
}

export interface HandAngles {
  hour: number;
  minute: number;
  second: number;
}

const TIME_PATTERN = /^(\d{1,2}):(\d{2}):(\d{2}(?:\.\d+)?)$/;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

const WEEKDAYS = ['SUN', 'MON', 'TUE', 'WED', 'THU', 'FRI', 'SAT'];
const MONTHS = ['JAN', 'FEB', 'MAR', 'APR', 'MAY', 'JUN', 'JUL', 'AUG', 'SEP', 'OCT', 'NOV', 'DEC'];

export type DateFormat = 'day' | 'weekday' | 'month_day' | 'iso';

export class TimeService {
  /**
   * Parse "H:MM:SS", "HH:MM:SS" or "H:MM:SS.fff"
   */
  parseTime(value: string): TimeValue {
    const match = TIME_PATTERN.exec(value.trim());
    if (!match) {
      throw new ConfigError(`Invalid time format '${value}': expected H:MM:SS`);
    }

    const hours = Number(match[1]);
    const minutes = Number(match[2]);
    const seconds = Number(match[3]);

    if (hours > 23) {
      throw new ConfigError(`Invalid time format '${value}': hours must be 0-23`);
    }
    if (minutes > 59) {
      throw new ConfigError(`Invalid time format '${value}': minutes must be 0-59`);
    }
    if (seconds >= 60) {
      throw new ConfigError(`Invalid time format '${value}': seconds must be below 60`);
    }

    return { hours, minutes, seconds };
  }

  /**
   * Continuous hand angles: each hand advances with every smaller unit, so
   * 3:15:30 puts the hour hand 15.5 minutes past the 3 mark
   */
  timeToAngles(time: TimeValue, mode: DialMode = '12h'): HandAngles {
    const { hours, minutes, seconds } = time;
    const second = seconds * 6;
    const minute = minutes * 6 + seconds * 0.1;
    const hour =
      mode === '24h'
        ? hours * 15 + minutes * 0.25 + seconds / 240
        : (hours % 12) * 30 + minutes * 0.5 + seconds / 120;

    return { hour, minute, second };
  }

  /**
   * Parse "YYYY-MM-DD" into a UTC date, rejecting impossible days
   */
  parseDate(value: string): Date {
    const match = DATE_PATTERN.exec(value);
    if (!match) {
      throw new ConfigError(`Invalid date '${value}': expected YYYY-MM-DD`);
    }

    const year = Number(match[1]);
    const month = Number(match[2]);
    const day = Number(match[3]);
    const date = new Date(Date.UTC(year, month - 1, day));

    if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
      throw new ConfigError(`Invalid date '${value}': no such day`);
    }

    return date;
  }

  formatDate(date: Date, format: DateFormat): string {
    const day = date.getUTCDate();
    switch (format) {
      case 'day':
        return String(day);
      case 'weekday':
        return WEEKDAYS[date.getUTCDay()];
      case 'month_day':
        return `${MONTHS[date.getUTCMonth()]} ${day}`;
      case 'iso':
        return date.toISOString().slice(0, 10);
    }
  }

  /**
   * Today's calendar date in local time, as a UTC-midnight Date
   */
  today(): Date {
    const now = new Date();
    return new Date(Date.UTC(now.getFullYear(), now.getMonth(), now.getDate()));
  }
}
