import { formatInTimeZone } from 'date-fns-tz';

/**
 * Time Window Value Object
 * Half-open interval [start, end) expressed as instants, plus the IANA
 * timezone whose wall clock the window was planned in
 */
export interface TimeWindowProps {
  start: Date;
  end: Date;
  timezone: string;
}

export class TimeWindowVO {
  private readonly _start: Date;
  private readonly _end: Date;
  private readonly _timezone: string;

  private constructor(props: TimeWindowProps) {
    this._start = new Date(props.start.getTime());
    this._end = new Date(props.end.getTime());
    this._timezone = props.timezone;
  }

  static create(props: TimeWindowProps): TimeWindowVO {
    TimeWindowVO.validate(props);
    return new TimeWindowVO(props);
  }

  private static validate(props: TimeWindowProps): void {
    if (Number.isNaN(props.start.getTime()) || Number.isNaN(props.end.getTime())) {
      throw new Error('Time window boundaries must be valid dates');
    }
    if (props.start.getTime() >= props.end.getTime()) {
      throw new Error(
        `Time window start must be before end (${props.start.toISOString()} >= ${props.end.toISOString()})`,
      );
    }
    if (!props.timezone || props.timezone.trim().length === 0) {
      throw new Error('Time window timezone is required');
    }
  }

  get start(): Date {
    return new Date(this._start.getTime());
  }

  get end(): Date {
    return new Date(this._end.getTime());
  }

  get timezone(): string {
    return this._timezone;
  }

  get startEpochSeconds(): number {
    return Math.floor(this._start.getTime() / 1000);
  }

  get endEpochSeconds(): number {
    return Math.floor(this._end.getTime() / 1000);
  }

  get durationMs(): number {
    return this._end.getTime() - this._start.getTime();
  }

  /**
   * Stable identity of the window, independent of timezone rendering.
   */
  key(): string {
    return `${this.startEpochSeconds}-${this.endEpochSeconds}`;
  }

  /**
   * Wall-clock rendering, e.g. `2025-11-15 20:00-24:00`.
   * An end that falls on the following midnight renders as 24:00.
   */
  label(): string {
    const startDay = formatInTimeZone(this._start, this._timezone, 'yyyy-MM-dd');
    const startTime = formatInTimeZone(this._start, this._timezone, 'HH:mm');
    const endDay = formatInTimeZone(this._end, this._timezone, 'yyyy-MM-dd');
    const endTime = formatInTimeZone(this._end, this._timezone, 'HH:mm');

    if (endDay === startDay) {
      return `${startDay} ${startTime}-${endTime}`;
    }
    if (endTime === '00:00' && this.durationMs <= 24 * 60 * 60 * 1000) {
      return `${startDay} ${startTime}-24:00`;
    }
    return `${startDay} ${startTime}-${endDay} ${endTime}`;
  }

  contains(instant: Date): boolean {
    const ms = instant.getTime();
    return ms >= this._start.getTime() && ms < this._end.getTime();
  }

  equals(other: TimeWindowVO): boolean {
    return (
      this._start.getTime() === other._start.getTime() &&
      this._end.getTime() === other._end.getTime() &&
      this._timezone === other._timezone
    );
  }

  toString(): string {
    return this.label();
  }

  toJSON() {
    return {
      start: this._start.toISOString(),
      end: this._end.toISOString(),
      timezone: this._timezone,
    };
  }
}
