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
import type {
  BubbleSeries, Categories, CategorySeries, DataValue, Series, XySeries,
} from 'chart-base-types';
import { ElementUtils } from './element-utils';

/**
 * the data-bearing children of one c:ser element. everything else in a
 * series (fill, line, markers, labels) belongs to the plot writer, or in
 * an existing document, to whoever formatted it.
 */
export interface SeriesFragments {

  /** c:tx */
  tx: Element;

  /** c:cat or c:xVal. omitted when there are no categories */
  categories?: Element;

  /** c:val or c:yVal */
  values: Element;

  /** c:bubbleSize */
  bubble_sizes?: Element;

}

/** fragments in schema order, skipping missing ones */
export const FragmentList = (fragments: SeriesFragments): Element[] => {
  return [fragments.tx, fragments.categories, fragments.values, fragments.bubble_sizes]
    .filter((element): element is Element => !!element);
};

/** numbers we can write. NaN and infinities are treated as missing. */
const IsPresent = (value: DataValue): value is number => {
  return typeof value === 'number' && Number.isFinite(value);
};

/**
 * builds detached data fragments for one series. the same fragments are
 * used when writing a new chart and when rewriting an existing one.
 */
export abstract class SeriesWriter<T extends Series> {

  /** fragment tags this writer owns, in schema order */
  public abstract readonly owned_tags: readonly string[];

  constructor(protected readonly date_1904 = false) {
  }

  public abstract Fragments(series: T): SeriesFragments;

  /** c:tx with a string reference and a one-point cache */
  public Name(series: T): Element {
    const tx = ElementUtils.Create('c:tx');
    const str_ref = ElementUtils.Add(tx, 'c:strRef');
    ElementUtils.AddText(str_ref, 'c:f', series.name_ref);
    const cache = ElementUtils.Add(str_ref, 'c:strCache');
    ElementUtils.AddValue(cache, 'c:ptCount', 1);
    const pt = ElementUtils.Add(cache, 'c:pt', { idx: 0 });
    ElementUtils.AddText(pt, 'c:v', series.name);
    return tx;
  }

  /**
   * numeric channel (c:val, c:yVal and so on). ptCount is the full
   * length; points are only written for values that are present, so
   * gaps stay gaps.
   */
  protected NumberReference(tag: string, reference: string, values: DataValue[], number_format: string): Element {

    const element = ElementUtils.Create(tag);
    const num_ref = ElementUtils.Add(element, 'c:numRef');
    ElementUtils.AddText(num_ref, 'c:f', reference);

    const cache = ElementUtils.Add(num_ref, 'c:numCache');
    ElementUtils.AddText(cache, 'c:formatCode', number_format);
    ElementUtils.AddValue(cache, 'c:ptCount', values.length);

    values.forEach((value, idx) => {
      if (IsPresent(value)) {
        const pt = ElementUtils.Add(cache, 'c:pt', { idx });
        ElementUtils.AddText(pt, 'c:v', String(value));
      }
    });

    return element;

  }

}

export class CategorySeriesWriter extends SeriesWriter<CategorySeries> {

  public readonly owned_tags = ['c:tx', 'c:cat', 'c:val'];

  public Fragments(series: CategorySeries): SeriesFragments {
    return {
      tx: this.Name(series),
      categories: this.Categories(series),
      values: this.NumberReference('c:val', series.values_ref, series.values, series.number_format),
    };
  }

  /**
   * c:cat. strings are written as a string cache, numbers and dates as
   * a number cache, and tuples as a multi-level string cache.
   */
  public Categories(series: CategorySeries): Element | undefined {

    const categories = series.categories;
    if (!categories.leaf_count) {
      return undefined;
    }

    const cat = ElementUtils.Create('c:cat');

    if (categories.kind === 'multi_level') {
      this.MultiLevelCategories(cat, series.categories_ref, categories);
    }
    else if (categories.are_numeric) {
      const num_ref = ElementUtils.Add(cat, 'c:numRef');
      ElementUtils.AddText(num_ref, 'c:f', series.categories_ref);
      const cache = ElementUtils.Add(num_ref, 'c:numCache');
      ElementUtils.AddText(cache, 'c:formatCode', categories.number_format);
      ElementUtils.AddValue(cache, 'c:ptCount', categories.leaf_count);
      for (let idx = 0; idx < categories.leaf_count; idx++) {
        const pt = ElementUtils.Add(cache, 'c:pt', { idx });
        ElementUtils.AddText(pt, 'c:v', categories.NumericText(idx, this.date_1904));
      }
    }
    else {
      const str_ref = ElementUtils.Add(cat, 'c:strRef');
      ElementUtils.AddText(str_ref, 'c:f', series.categories_ref);
      const cache = ElementUtils.Add(str_ref, 'c:strCache');
      ElementUtils.AddValue(cache, 'c:ptCount', categories.leaf_count);
      for (let idx = 0; idx < categories.leaf_count; idx++) {
        const pt = ElementUtils.Add(cache, 'c:pt', { idx });
        ElementUtils.AddText(pt, 'c:v', categories.Label(idx));
      }
    }

    return cat;

  }

  /** one c:lvl per level, leaf level first */
  protected MultiLevelCategories(cat: Element, reference: string, categories: Categories): void {

    const ref = ElementUtils.Add(cat, 'c:multiLvlStrRef');
    ElementUtils.AddText(ref, 'c:f', reference);

    const cache = ElementUtils.Add(ref, 'c:multiLvlStrCache');
    ElementUtils.AddValue(cache, 'c:ptCount', categories.leaf_count);

    for (const level of categories.levels) {
      const lvl = ElementUtils.Add(cache, 'c:lvl');
      for (const [idx, label] of level) {
        const pt = ElementUtils.Add(lvl, 'c:pt', { idx });
        ElementUtils.AddText(pt, 'c:v', label);
      }
    }

  }

}

export class XySeriesWriter extends SeriesWriter<XySeries> {

  public readonly owned_tags = ['c:tx', 'c:xVal', 'c:yVal'];

  public Fragments(series: XySeries): SeriesFragments {
    return {
      tx: this.Name(series),
      categories: this.NumberReference('c:xVal', series.x_values_ref, series.x_values, series.number_format),
      values: this.NumberReference('c:yVal', series.y_values_ref, series.y_values, series.number_format),
    };
  }

}

export class BubbleSeriesWriter extends SeriesWriter<BubbleSeries> {

  public readonly owned_tags = ['c:tx', 'c:xVal', 'c:yVal', 'c:bubbleSize'];

  public Fragments(series: BubbleSeries): SeriesFragments {
    return {
      tx: this.Name(series),
      categories: this.NumberReference('c:xVal', series.x_values_ref, series.x_values, series.number_format),
      values: this.NumberReference('c:yVal', series.y_values_ref, series.y_values, series.number_format),
      bubble_sizes: this.NumberReference('c:bubbleSize', series.bubble_sizes_ref, series.bubble_sizes, series.number_format),
    };
  }

}
