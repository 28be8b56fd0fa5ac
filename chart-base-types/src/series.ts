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


import type { Categories } from './categories';

/** a single data value. null/undefined are missing points (gaps) */
export type DataValue = number | null | undefined;

/**
 * explicit worksheet references. anything left out is derived from
 * the position of the series in its chart data.
 */
export interface SeriesReferences {
  name?: string;
  categories?: string;
  values?: string;
  x_values?: string;
  y_values?: string;
  bubble_sizes?: string;
}

export interface SeriesOptions {

  /** number format for the value channels. defaults to the chart data's format */
  number_format?: string;

  references?: SeriesReferences;

}

/** what a category series needs from its container */
export interface CategorySeriesSource {
  readonly categories: Categories;
  readonly number_format: string;
  IndexOf(series: CategorySeries): number;
  NameReference(series: CategorySeries): string;
  CategoriesReference(series: CategorySeries): string;
  ValuesReference(series: CategorySeries): string;
}

/** what an xy or bubble series needs from its container */
export interface PointSeriesSource {
  readonly number_format: string;
  IndexOf(series: XySeries | BubbleSeries): number;
  NameReference(series: XySeries | BubbleSeries): string;
  XValuesReference(series: XySeries | BubbleSeries): string;
  YValuesReference(series: XySeries | BubbleSeries): string;
  BubbleSizesReference(series: BubbleSeries): string;
}

/**
 * a named sequence of values plotted against shared categories.
 * index is the position in the container, so it stays contiguous.
 */
export class CategorySeries {

  public readonly shape = 'category';

  constructor(
    public readonly name: string,
    public readonly values: DataValue[],
    private readonly source: CategorySeriesSource,
    private readonly options: SeriesOptions = {}) {
  }

  /** position in the containing chart data */
  public get index(): number {
    return this.source.IndexOf(this);
  }

  public get categories(): Categories {
    return this.source.categories;
  }

  public get number_format(): string {
    return this.options.number_format || this.source.number_format;
  }

  public get length(): number {
    return this.values.length;
  }

  public get name_ref(): string {
    return this.options.references?.name ?? this.source.NameReference(this);
  }

  public get categories_ref(): string {
    return this.options.references?.categories ?? this.source.CategoriesReference(this);
  }

  public get values_ref(): string {
    return this.options.references?.values ?? this.source.ValuesReference(this);
  }

}

/**
 * shared by xy and bubble series: paired x/y channels.
 */
abstract class PointSeriesBase {

  public abstract readonly shape: 'xy' | 'bubble';

  public readonly x_values: DataValue[] = [];
  public readonly y_values: DataValue[] = [];

  constructor(
    public readonly name: string,
    protected readonly source: PointSeriesSource,
    protected readonly options: SeriesOptions = {}) {
  }

  public get number_format(): string {
    return this.options.number_format || this.source.number_format;
  }

  /** number of data points */
  public get length(): number {
    return this.y_values.length;
  }

}

export class XySeries extends PointSeriesBase {

  public readonly shape = 'xy';

  /** position in the containing chart data */
  public get index(): number {
    return this.source.IndexOf(this);
  }

  public AddDataPoint(x: DataValue, y: DataValue): this {
    this.x_values.push(x);
    this.y_values.push(y);
    return this;
  }

  public get name_ref(): string {
    return this.options.references?.name ?? this.source.NameReference(this);
  }

  public get x_values_ref(): string {
    return this.options.references?.x_values ?? this.source.XValuesReference(this);
  }

  public get y_values_ref(): string {
    return this.options.references?.y_values ?? this.source.YValuesReference(this);
  }

}

export class BubbleSeries extends PointSeriesBase {

  public readonly shape = 'bubble';

  /** position in the containing chart data */
  public get index(): number {
    return this.source.IndexOf(this);
  }

  public readonly bubble_sizes: DataValue[] = [];

  public AddDataPoint(x: DataValue, y: DataValue, size: DataValue): this {
    this.x_values.push(x);
    this.y_values.push(y);
    this.bubble_sizes.push(size);
    return this;
  }

  public get name_ref(): string {
    return this.options.references?.name ?? this.source.NameReference(this);
  }

  public get x_values_ref(): string {
    return this.options.references?.x_values ?? this.source.XValuesReference(this);
  }

  public get y_values_ref(): string {
    return this.options.references?.y_values ?? this.source.YValuesReference(this);
  }

  public get bubble_sizes_ref(): string {
    return this.options.references?.bubble_sizes ?? this.source.BubbleSizesReference(this);
  }

}

export type Series = CategorySeries | XySeries | BubbleSeries;
