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


/**
 * 1-based column number -> letters, A..Z, AA..ZZ, AAA.. etc.
 */
export const ColumnLetter = (column: number): string => {
  let letters = '';
  while (column > 0) {
    const x = ((column - 1) % 26) + 1;
    letters = String.fromCharCode(64 + x) + letters;
    column = (column - x) / 26;
  }
  return letters;
};

/**
 * quote a sheet name if it needs it. single quotes inside the name
 * are doubled.
 */
export const SheetPrefix = (sheet_name: string): string => {
  if (/^[A-Za-z_][A-Za-z0-9_.]*$/.test(sheet_name)) {
    return sheet_name + '!';
  }
  return `'${sheet_name.replace(/'/g, `''`)}'!`;
};

/**
 * absolute reference to a single cell, e.g. Sheet1!$B$1
 */
export const CellReference = (sheet_name: string, column: number, row: number): string => {
  return `${SheetPrefix(sheet_name)}$${ColumnLetter(column)}$${row}`;
};

/**
 * absolute reference to a block, e.g. Sheet1!$A$2:$A$4. if the block is
 * a single cell we still write both ends, which is what the host
 * application does for one-point series.
 */
export const RangeReference = (sheet_name: string,
    first_column: number, first_row: number,
    last_column: number, last_row: number): string => {

  return `${SheetPrefix(sheet_name)}$${ColumnLetter(first_column)}$${first_row}` +
    `:$${ColumnLetter(last_column)}$${last_row}`;

};
