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


import type { DataShape } from './chart-type';
import { Categories, type CategoryInput } from './categories';
import { CellReference, RangeReference } from './worksheet-reference';
import {
  BubbleSeries, CategorySeries, XySeries,
  type CategorySeriesSource, type Series, type DataValue, type PointSeriesSource, type SeriesOptions,
} from './series';

export interface ChartDataOptions {

  /** default number format for series values */
  number_format?: string;

  /** sheet name used in derived worksheet references */
  sheet_name?: string;

}

export const DefaultChartDataOptions: Required<ChartDataOptions> = {
  number_format: 'General',
  sheet_name: 'Sheet1',
};

/**
 * ordered list of series for one plot. indexes are assigned in creation
 * order, starting at 0, and are kept contiguous when series are removed.
 */
abstract class ChartDataBase<T extends Series> {

  public abstract readonly shape: DataShape;

  protected readonly options: Required<ChartDataOptions>;
  protected readonly series_list: T[] = [];

  constructor(options: ChartDataOptions = {}) {
    this.options = { ...DefaultChartDataOptions, ...options };
  }

  public get number_format(): string {
    return this.options.number_format;
  }

  public get sheet_name(): string {
    return this.options.sheet_name;
  }

  public get series(): readonly T[] {
    return this.series_list;
  }

  public get length(): number {
    return this.series_list.length;
  }

  /**
   * remove a series by index. later series move down so there are
   * no gaps.
   */
  public RemoveSeries(index: number): void {
    if (index < 0 || index >= this.series_list.length) {
      throw new RangeError(`series index out of range: ${index}`);
    }
    this.series_list.splice(index, 1);
  }

  public IndexOf(series: Series): number {
    return this.series_list.findIndex(entry => entry === series);
  }

  protected Push(series: T): T {
    this.series_list.push(series);
    return series;
  }

}

/**
 * data for bar, line, area, pie, doughnut and radar plots. the worksheet
 * layout puts categories in the first column(s) starting at row 2, and
 * each series in its own column after that with the name in row 1.
 */
export class CategoryChartData extends ChartDataBase<CategorySeries> implements CategorySeriesSource {

  public readonly shape = 'category';

  private categories_ = new Categories();

  constructor(categories: Categories | CategoryInput[] = [], options: ChartDataOptions = {}) {
    super(options);
    this.categories = categories;
  }

  public get categories(): Categories {
    return this.categories_;
  }

  public set categories(categories: Categories | CategoryInput[]) {
    this.categories_ = (categories instanceof Categories) ? categories : new Categories(categories);
  }

  public AddSeries(name: string, values: DataValue[], options: SeriesOptions = {}): CategorySeries {
    return this.Push(new CategorySeries(name, [...values], this, options));
  }

  public NameReference(series: CategorySeries): string {
    return CellReference(this.sheet_name, this.SeriesColumn(series), 1);
  }

  public CategoriesReference(): string {
    const count = this.categories_.leaf_count;
    if (!count) {
      return '';
    }
    return RangeReference(this.sheet_name, 1, 2, this.categories_.depth, count + 1);
  }

  public ValuesReference(series: CategorySeries): string {
    const column = this.SeriesColumn(series);
    return RangeReference(this.sheet_name, column, 2, column, Math.max(1, series.length) + 1);
  }

  private SeriesColumn(series: CategorySeries): number {
    return this.categories_.depth + 1 + series.index;
  }

}

/**
 * shared by xy and bubble data. each series gets its own table, stacked
 * vertically: a name row, then one row per point, then a spacer row.
 * x values are in column A, y values in column B, sizes in column C.
 */
abstract class PointChartDataBase<T extends XySeries | BubbleSeries> extends ChartDataBase<T> implements PointSeriesSource {

  public NameReference(series: XySeries | BubbleSeries): string {
    return CellReference(this.sheet_name, 2, this.RowOffset(series) + 1);
  }

  public XValuesReference(series: XySeries | BubbleSeries): string {
    return this.ColumnReference(series, 1);
  }

  public YValuesReference(series: XySeries | BubbleSeries): string {
    return this.ColumnReference(series, 2);
  }

  public BubbleSizesReference(series: BubbleSeries): string {
    return this.ColumnReference(series, 3);
  }

  protected ColumnReference(series: XySeries | BubbleSeries, column: number): string {
    const top = this.RowOffset(series) + 2;
    const bottom = top + Math.max(1, series.length) - 1;
    return RangeReference(this.sheet_name, column, top, column, bottom);
  }

  /** rows used by tables above this one */
  protected RowOffset(series: XySeries | BubbleSeries): number {
    let points = 0;
    for (const entry of this.series_list) {
      if (entry.index >= series.index) { break; }
      points += entry.length;
    }
    return series.index * 2 + points;
  }

}

export class XyChartData extends PointChartDataBase<XySeries> {

  public readonly shape = 'xy';

  public AddSeries(name: string, options: SeriesOptions = {}): XySeries {
    return this.Push(new XySeries(name, this, options));
  }

}

export class BubbleChartData extends PointChartDataBase<BubbleSeries> {

  public readonly shape = 'bubble';

  public AddSeries(name: string, options: SeriesOptions = {}): BubbleSeries {
    return this.Push(new BubbleSeries(name, this, options));
  }

}

export type ChartData = CategoryChartData | XyChartData | BubbleChartData;
