import { systemClock, type Clock, type FieldMap } from './types.js';

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/** `YYYY-MM-DD` in local time. */
export function formatDate(date: Date): string {
  return `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** `HH:MM:SS` in local time. */
export function formatTime(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/** Local midnight of the clock's current day. */
export function today(clock: Clock = systemClock): Date {
  const now = clock();
  return new Date(now.getFullYear(), now.getMonth(), now.getDate());
}

export function startOfToday(clock: Clock = systemClock): Date {
  return today(clock);
}

export function endOfToday(clock: Clock = systemClock): Date {
  const day = today(clock);
  return new Date(day.getFullYear(), day.getMonth(), day.getDate(), 23, 59, 59);
}

/**
 * Date window. Either bound defaults to today. An inverted window is passed
 * through as given; the remote service decides what it means.
 */
export function setDates(
  startDate: Date | undefined,
  endDate: Date | undefined,
  fields: FieldMap,
  clock: Clock = systemClock
): FieldMap {
  fields.ActivationDate = formatDate(startDate ?? today(clock));
  fields.DeactivationDate = formatDate(endDate ?? today(clock));
  return fields;
}

/**
 * Date + time window. Start defaults to today 00:00:00, end to today 23:59:59.
 */
export function setDatetimes(
  startDatetime: Date | undefined,
  endDatetime: Date | undefined,
  fields: FieldMap,
  clock: Clock = systemClock
): FieldMap {
  const start = startDatetime ?? startOfToday(clock);
  const end = endDatetime ?? endOfToday(clock);

  fields.ActivationDate = formatDate(start);
  fields.ActivationTime = formatTime(start);
  fields.DeactivationDate = formatDate(end);
  fields.DeactivationTime = formatTime(end);
  return fields;
}
