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
  ChartConfigurationError, ChartType, StructuralMismatchError, UnsupportedChartTypeError,
  type BubbleSeries, type CategorySeries, type DataShape, type Series, type XySeries,
} from 'chart-base-types';
import { ElementUtils } from './element-utils';
import {
  FindPlotArea, GroupShape, IntegerValue, OrderedSeries, PlotGroups, SetIntegerValue,
  type SeriesEntry,
} from './plot-area';
import {
  BubbleSeriesWriter, CategorySeriesWriter, FragmentList, XySeriesWriter,
  type SeriesFragments, type SeriesWriter,
} from './series-writer';
import type { ReconcileOptions } from './options';

/**
 * child order for c:ser, across every series type. the schemas differ by
 * plot type but they agree on the relative order of anything they share,
 * so one list works for inserting into any of them.
 */
const SeriesChildOrder = [
  'c:idx', 'c:order', 'c:tx', 'c:spPr', 'c:invertIfNegative', 'c:pictureOptions',
  'c:marker', 'c:explosion', 'c:dPt', 'c:dLbls', 'c:trendline', 'c:errBars',
  'c:cat', 'c:val', 'c:xVal', 'c:yVal', 'c:shape', 'c:smooth', 'c:bubbleSize',
  'c:bubble3D', 'c:extLst',
];

/** tags that come after this one in a c:ser */
const Successors = (tag: string): string[] => {
  const index = SeriesChildOrder.indexOf(tag);
  return index < 0 ? [] : SeriesChildOrder.slice(index + 1);
};

/**
 * rewrites the series in an existing chart so they match new data,
 * keeping formatting. if there are more new series than existing ones,
 * the last existing series is cloned (so new series look like it); if
 * there are fewer, series are removed from the end, along with any plot
 * group left empty. then the name, category and value fragments of each
 * series are replaced.
 *
 * everything that can fail is checked, and all fragments are built,
 * before the tree is touched.
 */
export abstract class SeriesReconciler<T extends Series = Series> {

  public abstract readonly data_shape: DataShape;

  /**
   * @param target c:plotArea, c:chart or c:chartSpace
   */
  public Reconcile(target: Element, series_list: readonly Series[], options: ReconcileOptions = {}): void {

    const plot_area = FindPlotArea(target);
    const typed = this.Select(series_list);

    if (!typed.length) {
      throw new ChartConfigurationError('no series to reconcile');
    }

    for (const group of PlotGroups(plot_area)) {
      const shape = GroupShape(group);
      if (shape !== this.data_shape) {
        throw new StructuralMismatchError(this.data_shape, shape);
      }
    }

    const existing = OrderedSeries(plot_area);
    if (!existing.length) {
      throw new ChartConfigurationError('chart has no series to reconcile against');
    }

    const writer = this.CreateWriter(!!options.date_1904);
    const fragments = typed.map(series => writer.Fragments(series));

    // from here on nothing throws

    const entries = this.AdjustCount(plot_area, existing, typed.length);

    entries.forEach((entry, index) => {
      this.ReplaceFragments(entry.ser, fragments[index], writer.owned_tags);
    });

  }

  protected abstract CreateWriter(date_1904: boolean): SeriesWriter<T>;

  /** narrow to our series type, or fail on the first one that doesn't fit */
  protected abstract Accept(series: Series): T | undefined;

  protected Select(series_list: readonly Series[]): T[] {
    const result: T[] = [];
    for (const series of series_list) {
      const accepted = this.Accept(series);
      if (!accepted) {
        throw new StructuralMismatchError(this.data_shape, series.shape);
      }
      result.push(accepted);
    }
    return result;
  }

  /** clone or trim so there are exactly count series */
  protected AdjustCount(plot_area: Element, existing: SeriesEntry[], count: number): SeriesEntry[] {

    const entries = [...existing];

    if (count > entries.length) {

      let next_idx = Math.max(...entries.map(entry => IntegerValue(entry.ser, 'c:idx'))) + 1;
      let next_order = Math.max(...entries.map(entry => IntegerValue(entry.ser, 'c:order'))) + 1;

      let source = entries[entries.length - 1];

      while (entries.length < count) {
        const ser = ElementUtils.Clone(source.ser);
        SetIntegerValue(ser, 'c:idx', next_idx++);
        SetIntegerValue(ser, 'c:order', next_order++);
        ElementUtils.InsertAfter(source.group, source.ser, ser);
        source = { ser, group: source.group };
        entries.push(source);
      }

    }
    else if (count < entries.length) {

      for (const entry of entries.splice(count).reverse()) {
        entry.group.remove(entry.ser);
      }

      for (const group of PlotGroups(plot_area)) {
        if (!ElementUtils.Child(group, 'c:ser')) {
          plot_area.remove(group);
        }
      }

    }

    return entries;

  }

  /**
   * remove the fragments this writer owns, then insert the new ones in
   * schema position. other children are not touched.
   */
  protected ReplaceFragments(ser: Element, fragments: SeriesFragments, owned_tags: readonly string[]): void {
    for (const tag of owned_tags) {
      ElementUtils.RemoveChildren(ser, tag);
    }
    for (const element of FragmentList(fragments)) {
      ElementUtils.InsertBefore(ser, element, Successors(ElementUtils.Tag(element)));
    }
  }

}

export class CategorySeriesReconciler extends SeriesReconciler<CategorySeries> {

  public readonly data_shape = 'category';

  protected CreateWriter(date_1904: boolean): CategorySeriesWriter {
    return new CategorySeriesWriter(date_1904);
  }

  protected Accept(series: Series): CategorySeries | undefined {
    return series.shape === 'category' ? series : undefined;
  }

}

export class XySeriesReconciler extends SeriesReconciler<XySeries> {

  public readonly data_shape = 'xy';

  protected CreateWriter(date_1904: boolean): XySeriesWriter {
    return new XySeriesWriter(date_1904);
  }

  protected Accept(series: Series): XySeries | undefined {
    return series.shape === 'xy' ? series : undefined;
  }

}

export class BubbleSeriesReconciler extends SeriesReconciler<BubbleSeries> {

  public readonly data_shape = 'bubble';

  protected CreateWriter(date_1904: boolean): BubbleSeriesWriter {
    return new BubbleSeriesWriter(date_1904);
  }

  protected Accept(series: Series): BubbleSeries | undefined {
    return series.shape === 'bubble' ? series : undefined;
  }

}

const category = new CategorySeriesReconciler();
const xy = new XySeriesReconciler();
const bubble = new BubbleSeriesReconciler();

/**
 * reconciler per chart type. this only depends on the data shape, so
 * it's the same for every variant in a family.
 */
export const SeriesReconcilerTable: Record<ChartType, SeriesReconciler> = {

  [ChartType.area]: category,
  [ChartType.area_stacked]: category,
  [ChartType.area_stacked_100]: category,
  [ChartType.bar_clustered]: category,
  [ChartType.bar_stacked]: category,
  [ChartType.bar_stacked_100]: category,
  [ChartType.column_clustered]: category,
  [ChartType.column_stacked]: category,
  [ChartType.column_stacked_100]: category,
  [ChartType.doughnut]: category,
  [ChartType.doughnut_exploded]: category,
  [ChartType.line]: category,
  [ChartType.line_markers]: category,
  [ChartType.line_markers_stacked]: category,
  [ChartType.line_markers_stacked_100]: category,
  [ChartType.line_stacked]: category,
  [ChartType.line_stacked_100]: category,
  [ChartType.pie]: category,
  [ChartType.pie_exploded]: category,
  [ChartType.radar]: category,
  [ChartType.radar_filled]: category,
  [ChartType.radar_markers]: category,

  [ChartType.bubble]: bubble,
  [ChartType.bubble_three_d_effect]: bubble,

  [ChartType.xy_scatter]: xy,
  [ChartType.xy_scatter_lines]: xy,
  [ChartType.xy_scatter_lines_no_markers]: xy,
  [ChartType.xy_scatter_smooth]: xy,
  [ChartType.xy_scatter_smooth_no_markers]: xy,

};

export const GetSeriesReconciler = (chart_type: ChartType): SeriesReconciler => {
  const reconciler: SeriesReconciler | undefined = SeriesReconcilerTable[chart_type];
  if (!reconciler) {
    throw new UnsupportedChartTypeError(String(chart_type), 'series reconciler');
  }
  return reconciler;
};
