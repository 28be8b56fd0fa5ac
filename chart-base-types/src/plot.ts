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


import { ChartTypeInfoFor, type ChartType, type ChartTypeInfo } from './chart-type';
import type { ChartData } from './chart-data';
import type { Series } from './series';
import { ChartConfigurationError } from './errors';

/**
 * one chart-type-homogeneous group of series. the data shape has to
 * match the chart type (category data for a column chart, xy data for
 * a scatter chart, and so on).
 */
export class Plot {

  public readonly info: ChartTypeInfo;

  /** assigned when the plot is added to a chart */
  public x_axis_id?: number;
  public y_axis_id?: number;

  constructor(
      public readonly chart_type: ChartType,
      public readonly data: ChartData,
      public readonly secondary_axis = false) {

    this.info = ChartTypeInfoFor(chart_type);

    if (this.info.data_shape !== data.shape) {
      throw new ChartConfigurationError(
        `chart type ${chart_type} needs ${this.info.data_shape} data, got ${data.shape} data`);
    }

  }

  public get has_axes(): boolean {
    return this.info.has_axes;
  }

  public get series(): readonly Series[] {
    return this.data.series;
  }

}
