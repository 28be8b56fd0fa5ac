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



export type LegendPosition = 'b' | 't' | 'l' | 'r' | 'tr';

export interface ChartWriterOptions {

  /**
   * use the 1904 date system. this affects the serial numbers written
   * for date categories, and sets c:date1904.
   */
  date_1904?: boolean;

  rounded_corners?: boolean;

  /** include a legend */
  legend?: boolean;

  legend_position?: LegendPosition;

  /** language tag for the default text properties */
  lang?: string;

  /** prepend the xml declaration when serializing */
  xml_declaration?: boolean;

}

export const DefaultChartWriterOptions: Required<ChartWriterOptions> = {
  date_1904: false,
  rounded_corners: false,
  legend: true,
  legend_position: 'r',
  lang: 'en-US',
  xml_declaration: true,
};

/** options for rewriting series in an existing document */
export interface ReconcileOptions {

  /**
   * date system of the document being edited. ChartSpace reads this
   * from c:date1904; if you call a reconciler directly, pass it here.
   */
  date_1904?: boolean;

}
