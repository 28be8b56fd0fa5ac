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
import type { Plot } from 'chart-base-types';
import { ElementUtils } from '../element-utils';
import { CategorySeriesWriter } from '../series-writer';
import { PlotWriter, type PlotWriterContext } from './plot-writer';

export class LinePlotWriter extends PlotWriter<'line'> {

  public readonly family = 'line';
  public readonly tag = 'c:lineChart';

  public Write(plot_area: Element, plot: Plot, context: PlotWriterContext): Element {

    const info = this.Info(plot);
    const series_list = this.CategorySeries(plot);
    const writer = new CategorySeriesWriter(context.date_1904);

    const group = ElementUtils.Add(plot_area, this.tag);
    ElementUtils.AddValue(group, 'c:grouping', info.grouping);
    ElementUtils.AddValue(group, 'c:varyColors', false);

    for (const series of series_list) {
      const fragments = writer.Fragments(series);
      const ser = this.SeriesElement(group, series, fragments);
      if (!info.markers) {
        this.NoMarker(ser);
      }
      this.SeriesData(ser, fragments);
      ElementUtils.AddValue(ser, 'c:smooth', false);
    }

    this.DataLabels(group);
    ElementUtils.AddValue(group, 'c:marker', true);
    ElementUtils.AddValue(group, 'c:smooth', false);
    this.AxisIds(group, plot);

    return group;

  }

}
