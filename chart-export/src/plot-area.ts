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
import { ChartConfigurationError, type DataShape } from 'chart-base-types';
import { ElementUtils } from './element-utils';

/**
 * helpers for finding things in an existing c:plotArea. plot groups are
 * the c:xxxChart children (c:barChart, c:lineChart and so on).
 */

/** true for plot group tags */
export const IsPlotGroupTag = (tag: string): boolean => /^c:\w+Chart$/.test(tag);

/**
 * find the plot area given the plot area itself, c:chart, or the
 * c:chartSpace root
 */
export const FindPlotArea = (element: Element): Element => {

  const tag = ElementUtils.Tag(element);
  let plot_area: Element | undefined;

  if (tag === 'c:plotArea') {
    plot_area = element;
  }
  else if (tag === 'c:chart') {
    plot_area = ElementUtils.Child(element, 'c:plotArea');
  }
  else if (tag === 'c:chartSpace') {
    plot_area = ElementUtils.Descend(element, 'c:chart', 'c:plotArea');
  }

  if (!plot_area) {
    throw new ChartConfigurationError(`no plot area in ${tag}`);
  }

  return plot_area;

};

/** plot groups in document order */
export const PlotGroups = (plot_area: Element): Element[] => {
  return plot_area.getchildren().filter(child => IsPlotGroupTag(ElementUtils.Tag(child)));
};

/** data shape the series in a plot group use */
export const GroupShape = (group: Element): DataShape => {
  switch (ElementUtils.Tag(group)) {
    case 'c:scatterChart':
      return 'xy';
    case 'c:bubbleChart':
      return 'bubble';
    default:
      return 'category';
  }
};

/** integer val of a child like c:idx; missing or garbage is 0 */
export const IntegerValue = (element: Element, tag: string): number => {
  const value = Number(ElementUtils.ChildValue(element, tag));
  return Number.isInteger(value) ? value : 0;
};

/**
 * set the val of a child like c:idx. if it's missing it's inserted at
 * the front, idx before order.
 */
export const SetIntegerValue = (element: Element, tag: 'c:idx' | 'c:order', value: number): void => {
  const child = ElementUtils.Child(element, tag);
  if (child) {
    ElementUtils.SetAttribute(child, 'val', value);
    return;
  }
  const created = ElementUtils.Create(tag, { val: value });
  ElementUtils.Insert(element, tag === 'c:idx' ? 0 : (ElementUtils.Child(element, 'c:idx') ? 1 : 0), created);
};

export interface SeriesEntry {

  /** the c:ser element */
  ser: Element;

  /** the plot group that contains it */
  group: Element;

}

/**
 * all series in the plot area, in display order: plot group order, and
 * within each group by c:order.
 */
export const OrderedSeries = (plot_area: Element): SeriesEntry[] => {
  const entries: SeriesEntry[] = [];
  for (const group of PlotGroups(plot_area)) {
    const list = ElementUtils.Children(group, 'c:ser')
      .map((ser, position) => ({ ser, position, order: IntegerValue(ser, 'c:order') }))
      .sort((a, b) => (a.order - b.order) || (a.position - b.position));
    for (const { ser } of list) {
      entries.push({ ser, group });
    }
  }
  return entries;
};
