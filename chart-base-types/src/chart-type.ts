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


import { UnsupportedChartTypeError } from './errors';

/**
 * supported chart types. this is a closed list; every value must have an
 * entry in the catalog below and in the writer and reconciler tables in
 * chart-export (those are typed as Record<ChartType, ...> so the compiler
 * will complain if you add a value here and forget them).
 */
export enum ChartType {
  area = 'area',
  area_stacked = 'area_stacked',
  area_stacked_100 = 'area_stacked_100',
  bar_clustered = 'bar_clustered',
  bar_stacked = 'bar_stacked',
  bar_stacked_100 = 'bar_stacked_100',
  bubble = 'bubble',
  bubble_three_d_effect = 'bubble_three_d_effect',
  column_clustered = 'column_clustered',
  column_stacked = 'column_stacked',
  column_stacked_100 = 'column_stacked_100',
  doughnut = 'doughnut',
  doughnut_exploded = 'doughnut_exploded',
  line = 'line',
  line_markers = 'line_markers',
  line_markers_stacked = 'line_markers_stacked',
  line_markers_stacked_100 = 'line_markers_stacked_100',
  line_stacked = 'line_stacked',
  line_stacked_100 = 'line_stacked_100',
  pie = 'pie',
  pie_exploded = 'pie_exploded',
  radar = 'radar',
  radar_filled = 'radar_filled',
  radar_markers = 'radar_markers',
  xy_scatter = 'xy_scatter',
  xy_scatter_lines = 'xy_scatter_lines',
  xy_scatter_lines_no_markers = 'xy_scatter_lines_no_markers',
  xy_scatter_smooth = 'xy_scatter_smooth',
  xy_scatter_smooth_no_markers = 'xy_scatter_smooth_no_markers',
}

/** how series data is indexed */
export type DataShape = 'category' | 'xy' | 'bubble';

export type PlotFamily = 'area' | 'bar' | 'line' | 'pie' | 'doughnut' | 'radar' | 'xy' | 'bubble';

export type Grouping = 'standard' | 'stacked' | 'percentStacked';
export type BarGrouping = 'clustered' | 'stacked' | 'percentStacked';
export type BarDirection = 'bar' | 'col';
export type RadarStyle = 'marker' | 'filled';
export type ScatterStyle = 'lineMarker' | 'smoothMarker';

interface CategoryFamily {
  data_shape: 'category';
}

export interface AreaTypeInfo extends CategoryFamily {
  family: 'area';
  has_axes: true;
  grouping: Grouping;
}

export interface BarTypeInfo extends CategoryFamily {
  family: 'bar';
  has_axes: true;
  bar_direction: BarDirection;
  grouping: BarGrouping;
}

export interface LineTypeInfo extends CategoryFamily {
  family: 'line';
  has_axes: true;
  grouping: Grouping;
  markers: boolean;
}

export interface PieTypeInfo extends CategoryFamily {
  family: 'pie';
  has_axes: false;
  exploded: boolean;
}

export interface DoughnutTypeInfo extends CategoryFamily {
  family: 'doughnut';
  has_axes: false;
  exploded: boolean;
}

export interface RadarTypeInfo extends CategoryFamily {
  family: 'radar';
  has_axes: false;
  radar_style: RadarStyle;
  markers: boolean;
}

export interface XyTypeInfo {
  family: 'xy';
  data_shape: 'xy';
  has_axes: true;
  scatter_style: ScatterStyle;
  markers: boolean;

  /** false for the markers-only scatter, which hides the connecting line */
  lines: boolean;
}

export interface BubbleTypeInfo {
  family: 'bubble';
  data_shape: 'bubble';
  has_axes: true;
  three_d: boolean;
}

export type ChartTypeInfo =
  AreaTypeInfo |
  BarTypeInfo |
  LineTypeInfo |
  PieTypeInfo |
  DoughnutTypeInfo |
  RadarTypeInfo |
  XyTypeInfo |
  BubbleTypeInfo ;

/** narrow the union by family */
export type FamilyInfo<F extends PlotFamily> = Extract<ChartTypeInfo, { family: F }>;

const area = (grouping: Grouping): AreaTypeInfo =>
  ({ family: 'area', data_shape: 'category', has_axes: true, grouping });

const bar = (bar_direction: BarDirection, grouping: BarGrouping): BarTypeInfo =>
  ({ family: 'bar', data_shape: 'category', has_axes: true, bar_direction, grouping });

const line = (grouping: Grouping, markers: boolean): LineTypeInfo =>
  ({ family: 'line', data_shape: 'category', has_axes: true, grouping, markers });

const xy = (scatter_style: ScatterStyle, markers: boolean, lines = true): XyTypeInfo =>
  ({ family: 'xy', data_shape: 'xy', has_axes: true, scatter_style, markers, lines });

/**
 * static facts for each chart type.
 */
export const ChartTypeCatalog: Record<ChartType, ChartTypeInfo> = {

  [ChartType.area]:             area('standard'),
  [ChartType.area_stacked]:     area('stacked'),
  [ChartType.area_stacked_100]: area('percentStacked'),

  [ChartType.bar_clustered]:      bar('bar', 'clustered'),
  [ChartType.bar_stacked]:        bar('bar', 'stacked'),
  [ChartType.bar_stacked_100]:    bar('bar', 'percentStacked'),
  [ChartType.column_clustered]:   bar('col', 'clustered'),
  [ChartType.column_stacked]:     bar('col', 'stacked'),
  [ChartType.column_stacked_100]: bar('col', 'percentStacked'),

  [ChartType.bubble]:                { family: 'bubble', data_shape: 'bubble', has_axes: true, three_d: false },
  [ChartType.bubble_three_d_effect]: { family: 'bubble', data_shape: 'bubble', has_axes: true, three_d: true },

  [ChartType.doughnut]:          { family: 'doughnut', data_shape: 'category', has_axes: false, exploded: false },
  [ChartType.doughnut_exploded]: { family: 'doughnut', data_shape: 'category', has_axes: false, exploded: true },

  [ChartType.line]:                     line('standard', false),
  [ChartType.line_markers]:             line('standard', true),
  [ChartType.line_markers_stacked]:     line('stacked', true),
  [ChartType.line_markers_stacked_100]: line('percentStacked', true),
  [ChartType.line_stacked]:             line('stacked', false),
  [ChartType.line_stacked_100]:         line('percentStacked', false),

  [ChartType.pie]:          { family: 'pie', data_shape: 'category', has_axes: false, exploded: false },
  [ChartType.pie_exploded]: { family: 'pie', data_shape: 'category', has_axes: false, exploded: true },

  [ChartType.radar]:         { family: 'radar', data_shape: 'category', has_axes: false, radar_style: 'marker', markers: false },
  [ChartType.radar_filled]:  { family: 'radar', data_shape: 'category', has_axes: false, radar_style: 'filled', markers: false },
  [ChartType.radar_markers]: { family: 'radar', data_shape: 'category', has_axes: false, radar_style: 'marker', markers: true },

  [ChartType.xy_scatter]:                   xy('lineMarker', true, false),
  [ChartType.xy_scatter_lines]:             xy('lineMarker', true),
  [ChartType.xy_scatter_lines_no_markers]:  xy('lineMarker', false),
  [ChartType.xy_scatter_smooth]:            xy('smoothMarker', true),
  [ChartType.xy_scatter_smooth_no_markers]: xy('smoothMarker', false),

};

/** every chart type, in declaration order */
export const ChartTypeList = Object.values(ChartType);

/** typeguard */
export const IsChartType = (value: unknown): value is ChartType => {
  return (typeof value === 'string') && ChartTypeList.some(entry => entry === value);
};

/**
 * catalog lookup. values can arrive from untyped callers (JSON, casts), so
 * a miss is checked at runtime and reported as an unsupported type.
 */
export const ChartTypeInfoFor = (chart_type: ChartType): ChartTypeInfo => {
  const info: ChartTypeInfo | undefined = IsChartType(chart_type) ? ChartTypeCatalog[chart_type] : undefined;
  if (!info) {
    throw new UnsupportedChartTypeError(String(chart_type));
  }
  return info;
};
