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


import { ChartType, UnsupportedChartTypeError } from 'chart-base-types';
import type { PlotWriter } from './plot-writer';
import { AreaPlotWriter } from './area-plot';
import { BarPlotWriter } from './bar-plot';
import { LinePlotWriter } from './line-plot';
import { PiePlotWriter } from './pie-plot';
import { DoughnutPlotWriter } from './doughnut-plot';
import { RadarPlotWriter } from './radar-plot';
import { XyPlotWriter } from './xy-plot';
import { BubblePlotWriter } from './bubble-plot';

// writers hold no state, one instance per family is enough

const area = new AreaPlotWriter();
const bar = new BarPlotWriter();
const line = new LinePlotWriter();
const pie = new PiePlotWriter();
const doughnut = new DoughnutPlotWriter();
const radar = new RadarPlotWriter();
const xy = new XyPlotWriter();
const bubble = new BubblePlotWriter();

export const PlotWriterTable: Record<ChartType, PlotWriter> = {

  [ChartType.area]: area,
  [ChartType.area_stacked]: area,
  [ChartType.area_stacked_100]: area,

  [ChartType.bar_clustered]: bar,
  [ChartType.bar_stacked]: bar,
  [ChartType.bar_stacked_100]: bar,
  [ChartType.column_clustered]: bar,
  [ChartType.column_stacked]: bar,
  [ChartType.column_stacked_100]: bar,

  [ChartType.bubble]: bubble,
  [ChartType.bubble_three_d_effect]: bubble,

  [ChartType.doughnut]: doughnut,
  [ChartType.doughnut_exploded]: doughnut,

  [ChartType.line]: line,
  [ChartType.line_markers]: line,
  [ChartType.line_markers_stacked]: line,
  [ChartType.line_markers_stacked_100]: line,
  [ChartType.line_stacked]: line,
  [ChartType.line_stacked_100]: line,

  [ChartType.pie]: pie,
  [ChartType.pie_exploded]: pie,

  [ChartType.radar]: radar,
  [ChartType.radar_filled]: radar,
  [ChartType.radar_markers]: radar,

  [ChartType.xy_scatter]: xy,
  [ChartType.xy_scatter_lines]: xy,
  [ChartType.xy_scatter_lines_no_markers]: xy,
  [ChartType.xy_scatter_smooth]: xy,
  [ChartType.xy_scatter_smooth_no_markers]: xy,

};

export const GetPlotWriter = (chart_type: ChartType): PlotWriter => {
  const writer: PlotWriter | undefined = PlotWriterTable[chart_type];
  if (!writer) {
    throw new UnsupportedChartTypeError(String(chart_type), 'plot writer');
  }
  return writer;
};
