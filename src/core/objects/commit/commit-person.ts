import { ObjectException } from '@/core/exceptions';

/**
 * Identity line of a commit:
 * ┌───────────────────────────────────────┐
 * │ Name <email> timestamp timezone       │
 * └───────────────────────────────────────┘
 * `timezone` is kept as the "+HHMM" / "-HHMM" string it is stored as.
 */
export class CommitPerson {
  private static readonly PATTERN = /^(.+) <([^>]*)> (\d+) ([+-]\d{4})$/;

  readonly name: string;
  readonly email: string;
  readonly timestamp: number;
  readonly timezone: string;

  constructor(name: string, email: string, timestamp: number, timezone: string = '+0000') {
    if (name.trim().length === 0) {
      throw new ObjectException('Name cannot be empty');
    }
    if (!/^[+-]\d{4}$/.test(timezone)) {
      throw new ObjectException(`Invalid timezone format: ${timezone}`);
    }
    this.name = name.trim();
    this.email = email.trim();
    this.timestamp = timestamp;
    this.timezone = timezone;
  }

  /**
   * A person stamped with the current time and the local offset.
   */
  static now(name: string, email: string, date: Date = new Date()): CommitPerson {
    const offsetMinutes = -date.getTimezoneOffset();
    const sign = offsetMinutes >= 0 ? '+' : '-';
    const hours = Math.floor(Math.abs(offsetMinutes) / 60);
    const minutes = Math.abs(offsetMinutes) % 60;
    const timezone = `${sign}${String(hours).padStart(2, '0')}${String(minutes).padStart(2, '0')}`;
    return new CommitPerson(name, email, Math.floor(date.getTime() / 1000), timezone);
  }

  formatForGit(): string {
    return `${this.name} <${this.email}> ${this.timestamp} ${this.timezone}`;
  }

  static parseFromGit(gitFormat: string): CommitPerson {
    const match = CommitPerson.PATTERN.exec(gitFormat);
    if (!match) {
      throw new ObjectException(`Invalid person format: ${gitFormat}`);
    }

    const [, name = '', email = '', seconds = '0', timezone = '+0000'] = match;
    return new CommitPerson(name, email, parseInt(seconds, 10), timezone);
  }
}
