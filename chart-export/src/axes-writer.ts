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
import type { Categories, Chart, DataShape } from 'chart-base-types';
import { ElementUtils } from './element-utils';

/** one pair of axes, as referenced by a plot group's c:axId elements */
interface AxisPair {
  x: number;
  y: number;
  secondary: boolean;

  /** data shape of the plots on this pair */
  shape?: DataShape;

  /** categories of the first category plot on this pair, if any */
  categories?: Categories;
}

/**
 * writes the axis elements that follow the plot groups in c:plotArea.
 * each pair is written value axis first, then the category (or date, or
 * for scatter and bubble charts, second value) axis. the primary pair
 * comes first.
 *
 * positions are fixed: the category axis is at the bottom and the value
 * axis on the left (right for the secondary pair). horizontal bar charts
 * use the same positions; office swaps them on render.
 */
export class AxesWriter {

  constructor(private readonly chart: Chart) {
  }

  public Write(plot_area: Element): void {

    const pairs: AxisPair[] = [
      this.Pair(this.chart.x_axis_id, this.chart.y_axis_id, false),
    ];

    if (this.chart.secondary_x_axis_id !== undefined && this.chart.secondary_y_axis_id !== undefined) {
      pairs.push(this.Pair(this.chart.secondary_x_axis_id, this.chart.secondary_y_axis_id, true));
    }

    for (const pair of pairs) {
      this.ValueAxis(plot_area, pair);
      switch (pair.shape) {
        case 'xy':
        case 'bubble':
          this.HorizontalValueAxis(plot_area, pair);
          break;
        default:
          if (pair.categories?.are_dates) {
            this.DateAxis(plot_area, pair);
          }
          else {
            this.CategoryAxis(plot_area, pair);
          }
          break;
      }
    }

  }

  /**
   * the kind of axis depends on the plots drawn against it. the chart
   * won't let plots with different data shapes share a pair.
   */
  protected Pair(x: number, y: number, secondary: boolean): AxisPair {

    const pair: AxisPair = { x, y, secondary };

    for (const plot of this.chart.plots) {
      if (plot.secondary_axis !== secondary) {
        continue;
      }
      pair.shape = pair.shape || plot.data.shape;
      if (plot.data.shape === 'category' && !pair.categories) {
        pair.categories = plot.data.categories;
      }
    }

    return pair;

  }

  /** c:axId, c:scaling and c:delete, which start every axis */
  protected AxisHeader(axis: Element, id: number, deleted: boolean): void {
    ElementUtils.AddValue(axis, 'c:axId', id);
    ElementUtils.AddValue(ElementUtils.Add(axis, 'c:scaling'), 'c:orientation', 'minMax');
    ElementUtils.AddValue(axis, 'c:delete', deleted);
  }

  /** the vertical value axis (y) */
  protected ValueAxis(plot_area: Element, pair: AxisPair): Element {

    const axis = ElementUtils.Add(plot_area, 'c:valAx');

    this.AxisHeader(axis, pair.y, false);
    ElementUtils.AddValue(axis, 'c:axPos', pair.secondary ? 'r' : 'l');

    if (!pair.secondary) {
      ElementUtils.Add(axis, 'c:majorGridlines');
    }

    ElementUtils.Add(axis, 'c:numFmt', { formatCode: 'General', sourceLinked: true });
    ElementUtils.AddValue(axis, 'c:majorTickMark', 'none');
    ElementUtils.AddValue(axis, 'c:minorTickMark', 'none');
    ElementUtils.AddValue(axis, 'c:tickLblPos', 'nextTo');
    ElementUtils.AddValue(axis, 'c:crossAx', pair.x);
    ElementUtils.AddValue(axis, 'c:crosses', pair.secondary ? 'max' : 'autoZero');
    ElementUtils.AddValue(axis, 'c:crossBetween', this.CrossBetween(pair));

    return axis;

  }

  /** the horizontal axis for scatter and bubble charts, which is a value axis */
  protected HorizontalValueAxis(plot_area: Element, pair: AxisPair): Element {

    const axis = ElementUtils.Add(plot_area, 'c:valAx');

    this.AxisHeader(axis, pair.x, pair.secondary);
    ElementUtils.AddValue(axis, 'c:axPos', 'b');
    ElementUtils.Add(axis, 'c:numFmt', { formatCode: 'General', sourceLinked: true });
    ElementUtils.AddValue(axis, 'c:majorTickMark', 'out');
    ElementUtils.AddValue(axis, 'c:minorTickMark', 'none');
    ElementUtils.AddValue(axis, 'c:tickLblPos', 'nextTo');
    ElementUtils.AddValue(axis, 'c:crossAx', pair.y);
    ElementUtils.AddValue(axis, 'c:crosses', 'autoZero');
    ElementUtils.AddValue(axis, 'c:crossBetween', this.CrossBetween(pair));

    return axis;

  }

  protected CategoryAxis(plot_area: Element, pair: AxisPair): Element {

    const axis = ElementUtils.Add(plot_area, 'c:catAx');

    this.AxisHeader(axis, pair.x, pair.secondary);
    ElementUtils.AddValue(axis, 'c:axPos', 'b');
    ElementUtils.AddValue(axis, 'c:majorTickMark', 'out');
    ElementUtils.AddValue(axis, 'c:minorTickMark', 'none');
    ElementUtils.AddValue(axis, 'c:tickLblPos', 'nextTo');
    ElementUtils.AddValue(axis, 'c:crossAx', pair.y);
    ElementUtils.AddValue(axis, 'c:auto', true);
    ElementUtils.AddValue(axis, 'c:lblAlgn', 'ctr');
    ElementUtils.AddValue(axis, 'c:lblOffset', 100);
    ElementUtils.AddValue(axis, 'c:noMultiLvlLbl', false);

    return axis;

  }

  protected DateAxis(plot_area: Element, pair: AxisPair): Element {

    const axis = ElementUtils.Add(plot_area, 'c:dateAx');
    const number_format = pair.categories?.number_format || 'General';

    this.AxisHeader(axis, pair.x, pair.secondary);
    ElementUtils.AddValue(axis, 'c:axPos', 'b');
    ElementUtils.Add(axis, 'c:numFmt', { formatCode: number_format, sourceLinked: true });
    ElementUtils.AddValue(axis, 'c:majorTickMark', 'out');
    ElementUtils.AddValue(axis, 'c:minorTickMark', 'none');
    ElementUtils.AddValue(axis, 'c:tickLblPos', 'nextTo');
    ElementUtils.AddValue(axis, 'c:crossAx', pair.y);
    ElementUtils.AddValue(axis, 'c:auto', true);
    ElementUtils.AddValue(axis, 'c:lblOffset', 100);
    ElementUtils.AddValue(axis, 'c:baseTimeUnit', 'days');

    return axis;

  }

  /** scatter and bubble plots put points on the gridlines */
  protected CrossBetween(pair: AxisPair): string {
    return (pair.shape === 'xy' || pair.shape === 'bubble') ? 'midCat' : 'between';
  }

}
