const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

export interface TimestampOptions {
  /** Append the numeric UTC offset, e.g. `+01:00`. */
  offset?: boolean;
  /** Minutes east of UTC. Defaults to the local offset of `date`. */
  utcOffsetMinutes?: number;
}

/**
 * `YYYY-MM-DDTHH:MM:SS.mmm[+HH:MM]` in the given offset (local time by
 * default).
 */
export function formatTimestamp(date: Date, options: TimestampOptions = {}): string {
  const offsetMinutes = options.utcOffsetMinutes ?? -date.getTimezoneOffset();
  const shifted = new Date(date.getTime() + offsetMinutes * 60_000);

  const stamp =
    `${pad(shifted.getUTCFullYear(), 4)}-${pad(shifted.getUTCMonth() + 1)}-${pad(shifted.getUTCDate())}` +
    `T${pad(shifted.getUTCHours())}:${pad(shifted.getUTCMinutes())}:${pad(shifted.getUTCSeconds())}` +
    `.${pad(shifted.getUTCMilliseconds(), 3)}`;

  if (!options.offset) {
    return stamp;
  }

  const sign = offsetMinutes < 0 ? '-' : '+';
  const absolute = Math.abs(offsetMinutes);
  return `${stamp}${sign}${pad(Math.floor(absolute / 60))}:${pad(absolute % 60)}`;
}
