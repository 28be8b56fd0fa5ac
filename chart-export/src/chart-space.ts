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


import type { Element, ElementTree } from 'elementtree';
import { ChartConfigurationError, type ChartData, type ChartType } from 'chart-base-types';
import { ElementUtils } from './element-utils';
import { FindPlotArea, OrderedSeries, PlotGroups } from './plot-area';
import { InspectChartType } from './plot-type-inspector';
import { GetSeriesReconciler } from './series-reconciler';

/** c:chart children, in schema order */
const ChartChildOrder = [
  'c:title', 'c:autoTitleDeleted', 'c:pivotFmts', 'c:view3D', 'c:floor', 'c:sideWall',
  'c:backWall', 'c:plotArea', 'c:legend', 'c:plotVisOnly', 'c:dispBlanksAs',
  'c:showDLblsOverMax', 'c:extLst',
];

/** c:chartSpace children that follow c:style */
const StyleSuccessors = [
  'c:clrMapOvr', 'c:pivotSource', 'c:protection', 'c:chart', 'c:spPr', 'c:txPr',
  'c:externalData', 'c:printSettings', 'c:userShapes', 'c:extLst',
];

const ChartSuccessors = (tag: string): string[] => ChartChildOrder.slice(ChartChildOrder.indexOf(tag) + 1);

/** chart styles are numbered like the gallery in the office UI */
const MaxChartStyle = 48;

const IsHorizontal = (axis: Element): boolean => {
  const position = ElementUtils.ChildValue(axis, 'c:axPos');
  return position === 'b' || position === 't';
};

const IsDeleted = (axis: Element): boolean => {
  const value = ElementUtils.ChildValue(axis, 'c:delete');
  return value === '1' || value === 'true';
};

/**
 * wrapper for a parsed chart part. this is the interface for editing an
 * existing chart: find the plot area and axes, check the chart type, and
 * replace the data.
 */
export class ChartSpace {

  constructor(public readonly tree: ElementTree) {
    const tag = ElementUtils.Tag(tree.getroot());
    if (tag !== 'c:chartSpace') {
      throw new ChartConfigurationError(`expected c:chartSpace, found ${tag}`);
    }
  }

  public static Parse(xml: string): ChartSpace {
    return new ChartSpace(ElementUtils.Parse(xml));
  }

  public get root(): Element {
    return this.tree.getroot();
  }

  public get plot_area(): Element {
    return FindPlotArea(this.root);
  }

  public get plot_groups(): Element[] {
    return PlotGroups(this.plot_area);
  }

  /** c:ser elements in display order */
  public get series(): Element[] {
    return OrderedSeries(this.plot_area).map(entry => entry.ser);
  }

  public get date_1904(): boolean {
    const value = ElementUtils.ChildValue(this.root, 'c:date1904');
    return value === '1' || value === 'true';
  }

  /** chart type of the first plot group */
  public get chart_type(): ChartType {
    const [group] = this.plot_groups;
    if (!group) {
      throw new ChartConfigurationError('chart has no plot groups');
    }
    return InspectChartType(group);
  }

  public get has_legend(): boolean {
    return !!ElementUtils.Descend(this.root, 'c:chart', 'c:legend');
  }

  public set has_legend(value: boolean) {

    const chart = ElementUtils.Child(this.root, 'c:chart');
    if (!chart || value === this.has_legend) {
      return;
    }

    if (value) {
      const legend = ElementUtils.Create('c:legend');
      ElementUtils.AddValue(legend, 'c:legendPos', 'r');
      ElementUtils.Add(legend, 'c:layout');
      ElementUtils.AddValue(legend, 'c:overlay', false);
      ElementUtils.InsertBefore(chart, legend, ChartSuccessors('c:legend'));
    }
    else {
      ElementUtils.RemoveChildren(chart, 'c:legend');
    }

  }

  /**
   * chart style index (c:style), 1-48, or undefined if the chart uses the
   * default style. setting undefined removes it.
   */
  public get chart_style(): number | undefined {
    const value = Number(ElementUtils.ChildValue(this.root, 'c:style'));
    return Number.isInteger(value) ? value : undefined;
  }

  public set chart_style(value: number | undefined) {

    if (value !== undefined && (!Number.isInteger(value) || value < 1 || value > MaxChartStyle)) {
      throw new ChartConfigurationError(`chart style must be an integer from 1 to ${MaxChartStyle}: ${value}`);
    }

    ElementUtils.RemoveChildren(this.root, 'c:style');

    if (value !== undefined) {
      ElementUtils.InsertBefore(this.root, ElementUtils.Create('c:style', { val: value }), StyleSuccessors);
    }

  }

  public get has_title(): boolean {
    return !!ElementUtils.Descend(this.root, 'c:chart', 'c:title');
  }

  /**
   * adding a title writes an empty one (office fills in the series name
   * or "Chart Title"). removing it also sets c:autoTitleDeleted, otherwise
   * office adds one back for single-series charts.
   */
  public set has_title(value: boolean) {

    const chart = ElementUtils.Child(this.root, 'c:chart');
    if (!chart) {
      return;
    }

    if (value) {
      if (!ElementUtils.Child(chart, 'c:title')) {
        const title = ElementUtils.Create('c:title');
        ElementUtils.Add(title, 'c:layout');
        ElementUtils.AddValue(title, 'c:overlay', false);
        ElementUtils.InsertBefore(chart, title, ChartSuccessors('c:title'));
      }
      return;
    }

    ElementUtils.RemoveChildren(chart, 'c:title');

    const deleted = ElementUtils.Child(chart, 'c:autoTitleDeleted');
    if (deleted) {
      ElementUtils.SetAttribute(deleted, 'val', true);
    }
    else {
      ElementUtils.InsertBefore(chart, ElementUtils.Create('c:autoTitleDeleted', { val: true }), ChartSuccessors('c:autoTitleDeleted'));
    }

  }

  /**
   * the category axis. if there's more than one we prefer one that's
   * visible. date axes count; for scatter and bubble charts this is
   * the horizontal value axis.
   */
  public CategoryAxis(): Element {

    const plot_area = this.plot_area;

    for (const tag of ['c:catAx', 'c:dateAx']) {
      const axes = ElementUtils.Children(plot_area, tag);
      if (axes.length) {
        return axes.find(axis => !IsDeleted(axis)) || axes[0];
      }
    }

    const horizontal = ElementUtils.Children(plot_area, 'c:valAx').find(IsHorizontal);
    if (horizontal) {
      return horizontal;
    }

    throw new ChartConfigurationError('chart has no category axis');

  }

  /** vertical value axis by index; 0 is primary, 1 is secondary */
  public ValueAxis(index = 0): Element {
    const axes = ElementUtils.Children(this.plot_area, 'c:valAx').filter(axis => !IsHorizontal(axis));
    const axis = axes[index];
    if (!axis) {
      throw new ChartConfigurationError(index ? `chart has no value axis at index ${index}` : 'chart has no value axis');
    }
    return axis;
  }

  /** rewrite series to match data, keeping formatting */
  public ReplaceData(data: ChartData): void {
    GetSeriesReconciler(this.chart_type).Reconcile(this.plot_area, data.series, { date_1904: this.date_1904 });
  }

  public ToXML(xml_declaration = true): string {
    return ElementUtils.Serialize(this.root, xml_declaration);
  }

}
