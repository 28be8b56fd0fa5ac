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
import {
  ChartConfigurationError, UnsupportedChartTypeError,
  type BubbleSeries, type CategorySeries, type ChartTypeInfo, type FamilyInfo,
  type Plot, type PlotFamily, type Series, type XySeries,
} from 'chart-base-types';
import { ElementUtils } from '../element-utils';
import type { SeriesFragments } from '../series-writer';

export interface PlotWriterContext {

  /** date system, for date category caches */
  date_1904: boolean;

}

/** typeguard */
export const IsFamily = <F extends PlotFamily>(info: ChartTypeInfo, family: F): info is FamilyInfo<F> => {
  return info.family === family;
};

/**
 * writes one plot group (c:barChart, c:lineChart, ...) into a plot area.
 * there's one writer per family; the chart type's catalog entry carries
 * the variant (grouping, markers and so on).
 */
export abstract class PlotWriter<F extends PlotFamily = PlotFamily> {

  public abstract readonly family: F;

  /** plot group element tag */
  public abstract readonly tag: string;

  public abstract Write(plot_area: Element, plot: Plot, context: PlotWriterContext): Element;

  /** catalog entry for the plot, checked against this writer's family */
  protected Info(plot: Plot): FamilyInfo<F> {
    const info = plot.info;
    if (!IsFamily(info, this.family)) {
      throw new UnsupportedChartTypeError(plot.chart_type, `${this.family} plot`);
    }
    return info;
  }

  protected CategorySeries(plot: Plot): readonly CategorySeries[] {
    const data = plot.data;
    if (data.shape !== 'category') {
      throw new ChartConfigurationError(`${this.family} plot needs category data, got ${data.shape} data`);
    }
    return data.series;
  }

  protected XySeries(plot: Plot): readonly XySeries[] {
    const data = plot.data;
    if (data.shape !== 'xy') {
      throw new ChartConfigurationError(`${this.family} plot needs xy data, got ${data.shape} data`);
    }
    return data.series;
  }

  protected BubbleSeries(plot: Plot): readonly BubbleSeries[] {
    const data = plot.data;
    if (data.shape !== 'bubble') {
      throw new ChartConfigurationError(`${this.family} plot needs bubble data, got ${data.shape} data`);
    }
    return data.series;
  }

  /** c:ser with c:idx, c:order and c:tx */
  protected SeriesElement(group: Element, series: Series, fragments: SeriesFragments): Element {
    const ser = ElementUtils.Add(group, 'c:ser');
    ElementUtils.AddValue(ser, 'c:idx', series.index);
    ElementUtils.AddValue(ser, 'c:order', series.index);
    ser.append(fragments.tx);
    return ser;
  }

  /** append c:cat/c:xVal, c:val/c:yVal and c:bubbleSize, whichever exist */
  protected SeriesData(ser: Element, fragments: SeriesFragments): void {
    for (const element of [fragments.categories, fragments.values, fragments.bubble_sizes]) {
      if (element) {
        ser.append(element);
      }
    }
  }

  /** data labels, all off */
  protected DataLabels(group: Element, leader_lines = false): Element {
    const labels = ElementUtils.Add(group, 'c:dLbls');
    for (const tag of ['c:showLegendKey', 'c:showVal', 'c:showCatName', 'c:showSerName', 'c:showPercent', 'c:showBubbleSize']) {
      ElementUtils.AddValue(labels, tag, false);
    }
    if (leader_lines) {
      ElementUtils.AddValue(labels, 'c:showLeaderLines', true);
    }
    return labels;
  }

  /** c:marker/c:symbol none */
  protected NoMarker(ser: Element): void {
    ElementUtils.AddValue(ElementUtils.Add(ser, 'c:marker'), 'c:symbol', 'none');
  }

  /** x then y */
  protected AxisIds(group: Element, plot: Plot): void {
    if (plot.x_axis_id === undefined || plot.y_axis_id === undefined) {
      throw new ChartConfigurationError('plot has no axis ids; add it to a chart first');
    }
    ElementUtils.AddValue(group, 'c:axId', plot.x_axis_id);
    ElementUtils.AddValue(group, 'c:axId', plot.y_axis_id);
  }

}
