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


import { ElementTree, type Element } from 'elementtree';
import { ChartConfigurationError, type Chart } from 'chart-base-types';
import { ElementUtils, Namespaces } from './element-utils';
import { DefaultChartWriterOptions, type ChartWriterOptions } from './options';
import { AxesWriter } from './axes-writer';
import { GetPlotWriter } from './plot/plot-writers';

/**
 * writes a complete chart part (c:chartSpace) for a chart. plots are
 * written in the order they were added, then the axes.
 */
export class ChartDocumentWriter {

  private readonly options: Required<ChartWriterOptions>;

  constructor(options: ChartWriterOptions = {}) {
    this.options = { ...DefaultChartWriterOptions, ...options };
  }

  public Render(chart: Chart): ElementTree {

    this.Validate(chart);

    // look up every writer before we start building, so an unsupported
    // type fails without producing anything
    const writers = chart.plots.map(plot => GetPlotWriter(plot.chart_type));

    const root = ElementUtils.Create('c:chartSpace', {
      'xmlns:c': Namespaces.c,
      'xmlns:a': Namespaces.a,
      'xmlns:r': Namespaces.r,
    });

    ElementUtils.AddValue(root, 'c:date1904', this.options.date_1904);
    ElementUtils.AddValue(root, 'c:roundedCorners', this.options.rounded_corners);

    const chart_element = ElementUtils.Add(root, 'c:chart');
    ElementUtils.AddValue(chart_element, 'c:autoTitleDeleted', true);

    const plot_area = ElementUtils.Add(chart_element, 'c:plotArea');
    ElementUtils.Add(plot_area, 'c:layout');

    chart.plots.forEach((plot, index) => {
      writers[index].Write(plot_area, plot, { date_1904: this.options.date_1904 });
    });

    if (chart.has_axes) {
      new AxesWriter(chart).Write(plot_area);
    }

    if (this.options.legend) {
      const legend = ElementUtils.Add(chart_element, 'c:legend');
      ElementUtils.AddValue(legend, 'c:legendPos', this.options.legend_position);
      ElementUtils.Add(legend, 'c:layout');
      ElementUtils.AddValue(legend, 'c:overlay', false);
    }

    ElementUtils.AddValue(chart_element, 'c:plotVisOnly', true);
    ElementUtils.AddValue(chart_element, 'c:dispBlanksAs', 'gap');
    ElementUtils.AddValue(chart_element, 'c:showDLblsOverMax', false);

    this.ShapeProperties(root);
    this.TextProperties(root);

    return new ElementTree(root);

  }

  public ToXML(chart: Chart): string {
    return ElementUtils.Serialize(this.Render(chart).getroot(), this.options.xml_declaration);
  }

  protected Validate(chart: Chart): void {

    if (!chart.plots.length) {
      throw new ChartConfigurationError('chart has no plots');
    }

    // Chart.AddPlot checks this too, but plots can be constructed
    // elsewhere and the first plot decides
    const has_axes = chart.plots[0].has_axes;
    for (const plot of chart.plots) {
      if (plot.has_axes !== has_axes) {
        throw new ChartConfigurationError('can\'t mix a plot with and without axes');
      }
    }

  }

  /** no fill, no border */
  protected ShapeProperties(root: Element): void {
    const sppr = ElementUtils.Add(root, 'c:spPr');
    ElementUtils.Add(sppr, 'a:noFill');
    ElementUtils.Add(ElementUtils.Add(sppr, 'a:ln'), 'a:noFill');
    ElementUtils.Add(sppr, 'a:effectLst');
  }

  protected TextProperties(root: Element): void {
    const txpr = ElementUtils.Add(root, 'c:txPr');
    ElementUtils.Add(txpr, 'a:bodyPr');
    ElementUtils.Add(txpr, 'a:lstStyle');
    const paragraph = ElementUtils.Add(txpr, 'a:p');
    ElementUtils.AddPath(paragraph, 'a:pPr', 'a:defRPr');
    ElementUtils.Add(paragraph, 'a:endParaRPr', { lang: this.options.lang });
  }

}
