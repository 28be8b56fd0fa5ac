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


import type { Element } from 'elementtree';
import { ChartType, UnsupportedChartTypeError } from 'chart-base-types';
import { ElementUtils } from './element-utils';

/** true if any series in the group has c:marker/c:symbol val="none" */
const HasNoMarkerSeries = (group: Element): boolean => {
  return ElementUtils.Children(group, 'c:ser').some(ser => {
    const symbol = ElementUtils.Descend(ser, 'c:marker', 'c:symbol');
    return !!symbol && ElementUtils.Attribute(symbol, 'val') === 'none';
  });
};

/** true if any series in the group has an unfilled line (markers only) */
const HasNoLineSeries = (group: Element): boolean => {
  return ElementUtils.Children(group, 'c:ser').some(ser => {
    return !!ElementUtils.Descend(ser, 'c:spPr', 'a:ln', 'a:noFill');
  });
};

const HasExplosion = (group: Element): boolean => {
  return ElementUtils.Children(group, 'c:ser').some(ser => !!ElementUtils.Child(ser, 'c:explosion'));
};

/** the grouping value, defaulting the way office does */
const Grouping = (group: Element, fallback: string): string => {
  return ElementUtils.ChildValue(group, 'c:grouping') || fallback;
};

/** stacked / percentStacked suffix */
const Stacking = (grouping: string): string => {
  switch (grouping) {
    case 'stacked': return '_stacked';
    case 'percentStacked': return '_stacked_100';
    default: return '';
  }
};

const ToChartType = (value: string, group: Element): ChartType => {
  const match = Object.values(ChartType).find(entry => entry === value);
  if (!match) {
    throw new UnsupportedChartTypeError(ElementUtils.Tag(group), 'plot group');
  }
  return match;
};

const Bar = (group: Element): ChartType => {
  const direction = ElementUtils.ChildValue(group, 'c:barDir') === 'bar' ? 'bar' : 'column';
  const grouping = Grouping(group, 'clustered');
  return ToChartType(direction + (grouping === 'clustered' || grouping === 'standard' ? '_clustered' : Stacking(grouping)), group);
};

const Line = (group: Element): ChartType => {
  const markers = HasNoMarkerSeries(group) ? '' : '_markers';
  return ToChartType('line' + markers + Stacking(Grouping(group, 'standard')), group);
};

const Radar = (group: Element): ChartType => {
  if (ElementUtils.ChildValue(group, 'c:radarStyle') === 'filled') {
    return ChartType.radar_filled;
  }
  return HasNoMarkerSeries(group) ? ChartType.radar : ChartType.radar_markers;
};

const Scatter = (group: Element): ChartType => {
  const no_markers = HasNoMarkerSeries(group);
  if (ElementUtils.ChildValue(group, 'c:scatterStyle') === 'smoothMarker') {
    return no_markers ? ChartType.xy_scatter_smooth_no_markers : ChartType.xy_scatter_smooth;
  }
  if (HasNoLineSeries(group)) {
    return ChartType.xy_scatter;
  }
  return no_markers ? ChartType.xy_scatter_lines_no_markers : ChartType.xy_scatter_lines;
};

const Bubble = (group: Element): ChartType => {
  const three_d = ElementUtils.Children(group, 'c:ser').some(ser => {
    return ElementUtils.ChildValue(ser, 'c:bubble3D') === '1';
  });
  return three_d ? ChartType.bubble_three_d_effect : ChartType.bubble;
};

/**
 * work out the chart type of an existing plot group element, from its
 * tag and the variant markers the plot writers put in it. this is used
 * to pick a reconciler when editing a chart we didn't write.
 */
export const InspectChartType = (group: Element): ChartType => {

  switch (ElementUtils.Tag(group)) {

    case 'c:areaChart':
      return ToChartType('area' + Stacking(Grouping(group, 'standard')), group);

    case 'c:barChart':
      return Bar(group);

    case 'c:lineChart':
      return Line(group);

    case 'c:pieChart':
      return HasExplosion(group) ? ChartType.pie_exploded : ChartType.pie;

    case 'c:doughnutChart':
      return HasExplosion(group) ? ChartType.doughnut_exploded : ChartType.doughnut;

    case 'c:radarChart':
      return Radar(group);

    case 'c:scatterChart':
      return Scatter(group);

    case 'c:bubbleChart':
      return Bubble(group);

  }

  throw new UnsupportedChartTypeError(ElementUtils.Tag(group), 'plot group');

};
