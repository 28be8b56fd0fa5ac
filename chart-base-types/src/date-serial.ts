/*
 * This file is part of TREB.
 *
 * TREB is free software: you can redistribute it and/or modify it under the 
 * terms of the GNU General Public License as published by the Free Software 
 * Foundation, either version 3 of the License, or (at your option) any 
 * later version.
 *
 * TREB is distributed in the hope that it will be useful, but WITHOUT ANY 
 * WARRANTY; without even the implied warranty of MERCHANTABILITY or FITNESS 
 * FOR A PARTICULAR PURPOSE. See the GNU General Public License for more 
 * details.
 *
 * You should have received a copy of the GNU General Public License along 
 * with TREB. If not, see <https://www.gnu.org/licenses/>. 
 *
 * Copyright 2022-2025 trebco, llc. 
 * info@treb.app
 * 
 */


//
// spreadsheet dates are day counts from an epoch. the default (1900) system
// counts from 1899-12-30, which absorbs the fictional 1900-02-29 for any
// date after March 1, 1900; the 1904 system counts from 1904-01-01.
//
// serial dates have no time zone. we read the calendar fields of a Date
// (local time, as the Date constructor takes them), so new Date(2024, 0, 1)
// is day 45292 wherever the code runs. the arithmetic itself is UTC so
// daylight savings can't shift a day.
//

const epoch_1900 = Date.UTC(1899, 11, 30);
const epoch_1904 = Date.UTC(1904, 0, 1);
const day_ms = 86400000;

/** the date's local calendar fields, as a UTC timestamp */
const CalendarTime = (date: Date): number => {
  return Date.UTC(
    date.getFullYear(), date.getMonth(), date.getDate(),
    date.getHours(), date.getMinutes(), date.getSeconds(), date.getMilliseconds());
};

/**
 * date -> serial day number. time of day becomes the fractional part.
 */
export const DateSerial = (date: Date, date_1904 = false): number => {
  const epoch = date_1904 ? epoch_1904 : epoch_1900;
  return (CalendarTime(date) - epoch) / day_ms;
};

/**
 * serial day number -> date, in local time
 */
export const SerialDate = (serial: number, date_1904 = false): Date => {
  const epoch = date_1904 ? epoch_1904 : epoch_1900;
  const utc = new Date(epoch + serial * day_ms);
  return new Date(
    utc.getUTCFullYear(), utc.getUTCMonth(), utc.getUTCDate(),
    utc.getUTCHours(), utc.getUTCMinutes(), utc.getUTCSeconds(), utc.getUTCMilliseconds());
};

/** yyyy-mm-dd from the date's calendar fields */
export const CalendarLabel = (date: Date): string => {
  const pad = (value: number) => String(value).padStart(2, '0');
  return `${String(date.getFullYear()).padStart(4, '0')}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
};
