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


import { ChartConfigurationError } from 'chart-base-types';
import { IsPlotGroupTag } from './plot-area';
import { default_parser, XMLUtils, type XMLNode } from './xml-utils';

/** values from one cached channel (c:val, c:xVal and so on) */
export type CachedValues = Array<number|undefined>;

export interface CachedSeries {
  index: number;
  order: number;
  name?: string;

  /** leaf labels, sized by ptCount. missing points are undefined */
  categories: Array<string|undefined>;

  /** c:val or c:yVal */
  values: CachedValues;

  /** scatter and bubble only */
  x_values?: CachedValues;

  /** bubble only */
  bubble_sizes?: CachedValues;

  /** ptCount of the value channel */
  point_count: number;
}

export interface CachedPlotGroup {

  /** element tag, e.g. c:barChart */
  tag: string;

  series: CachedSeries[];

}

/** plot groups we know how to read */
const SupportedGroups = [
  'c:areaChart', 'c:barChart', 'c:lineChart', 'c:pieChart', 'c:doughnutChart',
  'c:radarChart', 'c:scatterChart', 'c:bubbleChart',
];

interface CacheContents {
  count: number;
  points: Map<number, string>;
}

/**
 * read the cache under a channel element. any of the reference or
 * literal forms is fine; for multi-level categories we read the leaf
 * level, which is first.
 */
const ReadCache = (channel: XMLNode|undefined): CacheContents => {

  const contents: CacheContents = { count: 0, points: new Map() };
  if (!channel) {
    return contents;
  }

  const cache =
    XMLUtils.Find(channel, 'c:numRef/c:numCache') ||
    XMLUtils.Find(channel, 'c:strRef/c:strCache') ||
    XMLUtils.Find(channel, 'c:multiLvlStrRef/c:multiLvlStrCache') ||
    XMLUtils.Find(channel, 'c:numLit') ||
    XMLUtils.Find(channel, 'c:strLit');

  if (!cache) {
    return contents;
  }

  const level = XMLUtils.Find(cache, 'c:lvl');
  let max = -1;

  for (const pt of XMLUtils.FindAll(level || cache, 'c:pt')) {
    const idx = Number(XMLUtils.Attribute(pt, 'idx'));
    if (Number.isInteger(idx) && idx >= 0) {
      contents.points.set(idx, XMLUtils.Text(XMLUtils.Find(pt, 'c:v')));
      max = Math.max(max, idx);
    }
  }

  const count = Number(XMLUtils.Attribute(XMLUtils.Find(cache, 'c:ptCount'), 'val'));
  contents.count = Number.isInteger(count) && count >= 0 ? count : max + 1;

  return contents;

};

const ToNumbers = (contents: CacheContents): CachedValues => {
  const values: CachedValues = [];
  for (let i = 0; i < contents.count; i++) {
    const entry = contents.points.get(i);
    const value = entry === undefined ? NaN : Number(entry);
    values.push(Number.isFinite(value) ? value : undefined);
  }
  return values;
};

const ToLabels = (contents: CacheContents): Array<string|undefined> => {
  const labels: Array<string|undefined> = [];
  for (let i = 0; i < contents.count; i++) {
    labels.push(contents.points.get(i));
  }
  return labels;
};

const IntegerAttribute = (node: XMLNode, path: string): number => {
  const value = Number(XMLUtils.Attribute(XMLUtils.Find(node, path), 'val'));
  return Number.isInteger(value) ? value : 0;
};

const ReadName = (ser: XMLNode): string|undefined => {
  const tx = XMLUtils.Find(ser, 'c:tx');
  if (!tx) {
    return undefined;
  }
  const pt = XMLUtils.Find(tx, 'c:strRef/c:strCache/c:pt/c:v') || XMLUtils.Find(tx, 'c:v');
  return pt ? XMLUtils.Text(pt) : undefined;
};

const ReadSeries = (ser: XMLNode): CachedSeries => {

  const values = ReadCache(XMLUtils.Find(ser, 'c:val') || XMLUtils.Find(ser, 'c:yVal'));

  const series: CachedSeries = {
    index: IntegerAttribute(ser, 'c:idx'),
    order: IntegerAttribute(ser, 'c:order'),
    name: ReadName(ser),
    categories: ToLabels(ReadCache(XMLUtils.Find(ser, 'c:cat'))),
    values: ToNumbers(values),
    point_count: values.count,
  };

  const x_values = XMLUtils.Find(ser, 'c:xVal');
  if (x_values) {
    series.x_values = ToNumbers(ReadCache(x_values));
  }

  const bubble_sizes = XMLUtils.Find(ser, 'c:bubbleSize');
  if (bubble_sizes) {
    series.bubble_sizes = ToNumbers(ReadCache(bubble_sizes));
  }

  return series;

};

/**
 * read the data cached in a chart part: for each plot group, the series
 * names, categories and values. this doesn't touch the backing workbook,
 * it's whatever the chart had the last time it was saved.
 *
 * plot groups are returned grouped by tag, in the order each tag first
 * appears. series within a group are sorted by c:order.
 */
export const ReadChartData = (xml: string): CachedPlotGroup[] => {

  const root = default_parser.parse(xml);
  const plot_area = XMLUtils.Find(root, 'c:chartSpace/c:chart/c:plotArea');

  if (!plot_area) {
    throw new ChartConfigurationError('no plot area in chart');
  }

  const groups: CachedPlotGroup[] = [];

  for (const tag of XMLUtils.ChildNames(plot_area)) {

    if (!IsPlotGroupTag(tag)) {
      continue;
    }

    if (!SupportedGroups.includes(tag)) {
      console.warn('skipping unsupported plot group', tag);
      continue;
    }

    for (const group of XMLUtils.FindAll(plot_area, tag)) {
      const series = XMLUtils.FindAll(group, 'c:ser')
        .map(ser => ReadSeries(ser))
        .sort((a, b) => a.order - b.order);
      groups.push({ tag, series });
    }

  }

  return groups;

};
